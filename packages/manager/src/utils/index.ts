export { formatError } from "./format-error.js";
export { redact } from "./redact.js";
export { sleep } from "./sleep.js";
