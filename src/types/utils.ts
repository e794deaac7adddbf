/**
 * Core type utilities for sqlchat.
 * These types replace 'any' for data that crosses the model and database boundaries.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * Values that may be bound to a `?` placeholder in a statement.
 */
export type SqlParam = string | number | bigint | Buffer | null;

/**
 * One database row as returned by the driver, keyed by column name.
 */
export type Row = Record<string, unknown>;

/**
 * One database row as positional values, in column order.
 */
export type RowValues = unknown[];

/**
 * Narrows a parsed JSON value to a plain object.
 */
export function isJsonObject(value: JsonValue): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows an unknown driver value to a row object.
 */
export function isRow(value: unknown): value is Row {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows an unknown driver value to a positional row.
 */
export function isRowValues(value: unknown): value is RowValues {
	return Array.isArray(value);
}
