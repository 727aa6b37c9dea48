export { evaluateCompatibility, isCompatibleWithAll } from './evaluator.js';
