export {
  ParseError,
  isParseError,
  type ErrorKind,
  type ErrorCategory,
  type ErrorLocation,
  type ParseErrorOptions,
} from "./errors.js";
export {
  classify,
  makeToken,
  isValid,
  unquote,
  tokenToFloat,
  tokenToInt,
  tokenToBool,
  type Token,
  type TokenKind,
} from "./token.js";
export { Tokenizer, tokenize, type TokenizerOptions } from "./tokenizer.js";
export {
  PARAM_TYPES,
  isParamType,
  Param,
  ParamList,
  type ParamType,
  type ParamValues,
} from "./param.js";
export * from "./directive.js";
export { Parser, parseDirectives, type ParserOptions } from "./parser.js";
