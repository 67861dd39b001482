export { formatError } from "./format-error.js";
