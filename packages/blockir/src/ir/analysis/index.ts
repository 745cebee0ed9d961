/**
 * IR utilities exports
 */

export { Formatter, type FormatterOptions } from "./formatter.js";
export { Validator, type ValidatorOptions } from "./validator.js";
