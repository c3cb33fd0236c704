export { bootstrap } from './bootstrap.js';
export type { App, BootstrapOptions } from './bootstrap.js';
export { CALCULATOR_TOOLS, registerCalculatorTools } from './calculator-tools.js';
