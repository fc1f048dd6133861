export class ConfigError extends Error {
  constructor(readonly key: string, message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StorageError extends Error {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class UserInputError extends Error {
  constructor(readonly usage: string) {
    super(usage);
    this.name = "UserInputError";
  }
}

export class PermissionDeniedError extends Error {
  constructor(message = "This command is for group admins only.") {
    super(message);
    this.name = "PermissionDeniedError";
  }
}
