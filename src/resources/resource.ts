import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import type { ArtifactClient } from '../core/client.js';
import type { QueryFilters } from '../core/types.js';
import type { OperationOptions } from '../types/request.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Describes one artifact collection of the service. */
export interface ResourceDefinition<Item extends StandardSchemaV1> {
  /** Collection path segment, e.g. `defect`. */
  type: string;
  /** Key the object is wrapped under in request and get-response bodies, e.g. `Defect`. */
  name: string;
  /** Shape of a single object. */
  schema: Item;
}

const queryEnvelopeSchema = z.object({
  QueryResult: z.object({
    Results: z.array(z.unknown()),
    TotalResultCount: z.number().optional(),
  }),
});

const createEnvelopeSchema = z.object({
  CreateResult: z.object({ Object: z.unknown() }),
});

const operationEnvelopeSchema = z.object({
  OperationResult: z.object({ Object: z.unknown() }),
});

const deleteEnvelopeSchema = z.object({
  OperationResult: z.object({}).passthrough(),
});

const keyedEnvelopeSchema = z.record(z.string(), z.unknown());

/**
 * Typed access to one artifact collection, unwrapping the service's result envelopes:
 *
 * | Operation | Request body        | Result taken from           |
 * | --------- | ------------------- | --------------------------- |
 * | query     |                     | `QueryResult.Results`       |
 * | get       |                     | `<name>`                    |
 * | create    | `{ <name>: item }`  | `CreateResult.Object`       |
 * | update    | `{ <name>: patch }` | `OperationResult.Object`    |
 * | delete    |                     | nothing                     |
 */
export class ArtifactResource<Item extends StandardSchemaV1> {
  #client: ArtifactClient;
  #type: string;
  #name: string;
  #schema: Item;

  constructor(client: ArtifactClient, { type, name, schema }: ResourceDefinition<Item>) {
    this.#client = client;
    this.#type = type;
    this.#name = name;
    this.#schema = schema;
  }

  /** Collection path segment this resource addresses. */
  get type(): string {
    return this.#type;
  }

  /**
   * Finds objects matching every filter.
   */
  async query(
    filters: QueryFilters,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Item>[]> {
    const [err, envelope] = await this.#client.query(this.#type, filters, queryEnvelopeSchema, opts);
    if (err) {
      return [err, null];
    }

    const items: StandardSchemaV1.InferOutput<Item>[] = [];
    for (const [index, result] of envelope.QueryResult.Results.entries()) {
      const [errItem, item] = await validator(result, this.#schema);
      if (errItem) {
        return [new Error(`error validating ${this.#name} result ${index} in query`, { cause: errItem }), null];
      }
      items.push(item);
    }

    return [null, items];
  }

  /**
   * Reads one object by its ObjectID.
   */
  async get(id: string | number, opts?: OperationOptions): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Item>> {
    const [err, envelope] = await this.#client.get(this.#type, String(id), keyedEnvelopeSchema, opts);
    if (err) {
      return [err, null];
    }

    return this.#item(envelope[this.#name], 'get');
  }

  /**
   * Creates an object and returns it as stored by the service.
   */
  async create(
    item: StandardSchemaV1.InferInput<Item>,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Item>> {
    const body = { [this.#name]: item };
    const [err, envelope] = await this.#client.create(this.#type, body, createEnvelopeSchema, opts);
    if (err) {
      return [err, null];
    }

    return this.#item(envelope.CreateResult.Object, 'create');
  }

  /**
   * Updates the given fields of an object and returns the updated object.
   */
  async update(
    id: string | number,
    changes: Partial<StandardSchemaV1.InferInput<Item>>,
    opts?: OperationOptions,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Item>> {
    const body = { [this.#name]: changes };
    const [err, envelope] = await this.#client.update(this.#type, String(id), body, operationEnvelopeSchema, opts);
    if (err) {
      return [err, null];
    }

    return this.#item(envelope.OperationResult.Object, 'update');
  }

  /**
   * Deletes an object.
   */
  async delete(id: string | number, opts?: OperationOptions): SafeWrapAsync<Error, void> {
    const [err] = await this.#client.delete(this.#type, String(id), deleteEnvelopeSchema, opts);
    if (err) {
      return [err, null];
    }

    return [null, undefined];
  }

  async #item(value: unknown, operation: string): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<Item>> {
    const [err, item] = await validator(value, this.#schema);
    if (err) {
      return [new Error(`error validating ${this.#name} in ${operation}`, { cause: err }), null];
    }

    return [null, item];
  }
}
