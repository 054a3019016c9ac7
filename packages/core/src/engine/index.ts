/**
 * Stateful engine facade.
 * @packageDocumentation
 */

export { RegexEngine, type EngineMatchOptions } from './regex-engine'
