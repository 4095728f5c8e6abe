/**
 * Error taxonomy for the scrape engine.
 *
 * Only ConnectionError ends a scrape cycle early. ScrapeError costs one
 * table group, MalformedValueError costs one field.
 */

import type { ScrapeGroup } from "@proxysql-exporter/shared";

export class ExporterError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The admin interface could not be reached */
export class ConnectionError extends ExporterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILED", message, options);
  }
}

/** A whole table group failed */
export class ScrapeError extends ExporterError {
  readonly group: ScrapeGroup;

  constructor(
    group: ScrapeGroup,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(options?.code ?? "SCRAPE_FAILED", message, options);
    this.group = group;
  }
}

/** The group's administrative query failed */
export class QueryError extends ScrapeError {
  readonly query: string;

  constructor(group: ScrapeGroup, query: string, cause: unknown) {
    super(group, `query for ${group} failed: ${describeCause(cause)}`, {
      cause,
      code: "QUERY_FAILED",
    });
    this.query = query;
  }
}

/** An admin operation did not settle within the configured timeout */
export class TimeoutError extends ExporterError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** A single field could not be turned into a sample */
export class MalformedValueError extends ExporterError {
  readonly field: string;
  readonly raw: string | null;

  constructor(field: string, raw: string | null, reason: string, code = "MALFORMED_VALUE") {
    super(code, `${field}: ${reason}`);
    this.field = field;
    this.raw = raw;
  }
}

/** Backend status text outside the ordinal table */
export class UnknownStatusError extends MalformedValueError {
  constructor(field: string, raw: string) {
    super(field, raw, `unknown status "${raw}"`, "UNKNOWN_STATUS");
  }
}

/** A descriptor table breaks the naming invariants */
export class RegistryError extends ExporterError {
  constructor(message: string) {
    super("INVALID_REGISTRY", message);
  }
}

export class ConfigError extends ExporterError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
