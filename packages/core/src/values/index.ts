export { BooleanValue } from "./boolean.js";
export { StringValue } from "./string.js";
export { StringListValue } from "./string-list.js";
export { IntValue } from "./int.js";
