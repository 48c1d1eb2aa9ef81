/**
 * Line-oriented `source` directives, path expansion and flat graph walks.
 */
export * from './expander.js';
export * from './directives.js';
export * from './graph.js';
