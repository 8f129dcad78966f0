/**
 * GridCalc Engine - Formatting Module Exports
 */

export { formatNumber, formatError, formatResult } from './DisplayFormat.js';
