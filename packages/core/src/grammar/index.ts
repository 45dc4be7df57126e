export { compileGrammar, createGrammarRegistry } from './registry.js';
export type { CompiledGrammar, CompiledNoiseFilter, GrammarRegistry } from './registry.js';
