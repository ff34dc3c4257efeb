export {
  classify,
  classifyRaw,
  classifyAgainstBands,
  createInterpreter,
  deriveBands,
  parseMeasuredValue,
} from "./classify.js";
export { parseReference, parseInterval, parseInequality, parsePlainNumber } from "./parse.js";
export type {
  Bands,
  ClassificationStatus,
  Interpreter,
  MeasuredStatus,
  ParsedRange,
  ReferenceExpression,
} from "./types.js";
