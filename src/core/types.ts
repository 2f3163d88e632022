import type { StandardSchemaV1 } from '@standard-schema/spec';

/** Operations the client performs against a resource collection. */
export type ClientOperation = 'query' | 'get' | 'create' | 'update' | 'delete';

/**
 * Equality filters for a query, rendered one `query` parameter each as `( key = value )`.
 * Values are written verbatim; quoting and formatting them is up to the caller.
 */
export type QueryFilters = Record<string, string | number | boolean>;

/** Any Standard Schema, used as the shape a response body is decoded into. */
export type ResponseSchema = StandardSchemaV1;

/** Value a response schema decodes to. */
export type Decoded<Schema extends ResponseSchema> = StandardSchemaV1.InferOutput<Schema>;
