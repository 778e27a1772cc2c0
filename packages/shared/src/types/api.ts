/**
 * Panel API wire documents.
 * Responses are dynamically shaped, so they are typed as plain JSON and read
 * through accessor helpers rather than trusted interfaces.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;
