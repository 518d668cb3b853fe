export { execProcess } from "./exec-process.js";
