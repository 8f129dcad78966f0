/**
 * GridCalc Engine - Formula Module Exports
 */

export { FormulaLexer, FormulaSyntaxError } from './FormulaLexer.js';
export type { Token, TokenType } from './FormulaLexer.js';

export {
  FormulaParser,
  parseCell,
  parseNumberLiteral,
  isFormulaText,
  formulaReferences,
} from './FormulaParser.js';

export { evaluateCell, evaluateExpression, createEvaluationContext } from './FormulaEvaluator.js';
export type { CellSource, EvaluationContext } from './FormulaEvaluator.js';
