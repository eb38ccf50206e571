export { SchemaRegistry } from "./SchemaRegistry.js";
