export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class InvalidPathError extends Error {
  constructor(public readonly path: string, reason = "must be a relative path within the root") {
    super(`Invalid path '${path}': ${reason}`);
    this.name = "InvalidPathError";
  }
}
