/**
 * Raised by the HTTP clients when a collaborator cannot be reached, times out,
 * or answers with a status outside its contract.
 */
export class CollaboratorUnreachableError extends Error {
  readonly service: string;
  readonly detail: unknown;

  constructor(service: string, message: string, detail?: unknown) {
    super(`${service} unreachable: ${message}`);
    this.name = 'CollaboratorUnreachableError';
    this.service = service;
    this.detail = detail;
  }
}

export class InvalidQuantityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQuantityError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
