/**
 * @stockroom/types - Request schemas shared by the API and its clients
 */

export * from "./product.schema.js";
export * from "./report.schema.js";
export * from "./import.schema.js";
