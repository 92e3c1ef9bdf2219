/**
 * Raised while a route is registered with a handler that cannot be bound.
 *
 * Registration happens before the server accepts requests; this error is
 * never caught by Rivet and is expected to abort startup.
 */
export class RegistrationError extends Error {
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string, reason: string) {
    super(`${method} ${path}: ${reason}`);
    this.name = "RegistrationError";
    this.method = method;
    this.path = path;
  }
}
