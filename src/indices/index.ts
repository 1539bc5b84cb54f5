export { protectionIndex, moralHealthIndex, DEFAULT_INDICES, type IndicesSettings } from './calculator.js';
