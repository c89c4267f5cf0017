export { errorType, formatError } from "./format-error.js";
export { sleep, type Sleep } from "./sleep.js";
