import { STATUS_CODES } from "node:http";

export type ErrorCode =
  | "INVALID_COMMAND"
  | "INVALID_CONFIG"
  | "UNRESOLVED_REFERENCE"
  | "MALFORMED_DOCUMENT"
  | "UNEXPECTED_STATUS";

export class RulesetAdminError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "RulesetAdminError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CommandError extends RulesetAdminError {
  constructor(message: string) {
    super(message, "INVALID_COMMAND");
    this.name = "CommandError";
  }
}

export class ConfigError extends RulesetAdminError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

export class UnresolvedReferenceError extends RulesetAdminError {
  constructor(message: string) {
    super(message, "UNRESOLVED_REFERENCE");
    this.name = "UnresolvedReferenceError";
  }
}

export class MalformedDocumentError extends RulesetAdminError {
  constructor(message: string) {
    super(message, "MALFORMED_DOCUMENT");
    this.name = "MalformedDocumentError";
  }
}

export class UnexpectedStatusError extends RulesetAdminError {
  public readonly reason: string;

  constructor(
    public readonly url: string,
    public readonly status: number,
    reason?: string
  ) {
    const phrase = reason ?? STATUS_CODES[status] ?? "Unknown Status";
    super(`${url}: ${status} ${phrase}`, "UNEXPECTED_STATUS");
    this.name = "UnexpectedStatusError";
    this.reason = phrase;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
