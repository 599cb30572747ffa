// src/validator.ts
import type { ZodTypeAny } from "zod";
import type { Logger } from "./logger.js";

/**
 * Checks a response body against a named schema. Implementations report
 * failure through the return value and must not throw.
 */
export interface SchemaValidator {
  validate(body: unknown, schemaName: string): boolean;
}

/** Named zod schemas; mismatches are logged, never raised. */
export class SchemaRegistry implements SchemaValidator {
  private readonly schemas = new Map<string, ZodTypeAny>();

  constructor(private readonly log: Logger) {}

  addSchema(name: string, schema: ZodTypeAny): void {
    this.schemas.set(name, schema);
    this.log.debug({ schema: name }, "schema registered");
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  validate(body: unknown, schemaName: string): boolean {
    const schema = this.schemas.get(schemaName);
    if (!schema) {
      this.log.warn({ schema: schemaName }, "schema not found");
      return false;
    }

    if (body === null || typeof body !== "object" || Array.isArray(body)) {
      this.log.warn({ schema: schemaName }, "response body is not a JSON object, skipping validation");
      return false;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      this.log.error({ schema: schemaName, issues: result.error.issues }, "response failed schema validation");
      return false;
    }

    this.log.debug({ schema: schemaName }, "response passed schema validation");
    return true;
  }
}
