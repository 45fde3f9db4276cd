export { PadicField, type PadicFieldOptions } from "./padic-field.js";
