// packages/content-store/src/errors.ts

/**
 * flatblog のエラー基底クラス。code はログや JSON 応答での種別判定用
 */
export class BlogError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options: { cause?: unknown } = {}) {
    super(message);
    this.name = "BlogError";
    this.code = code;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

export type ValidationReason =
  | "title_required"
  | "slug_required"
  | "slug_reserved"
  | "slug_collision";

/** 利用者が直せる入力の問題。保存は一切行わない */
export class ValidationError extends BlogError {
  public readonly reason: ValidationReason;

  constructor(reason: ValidationReason, message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.reason = reason;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

export class NotFoundError extends BlogError {
  public readonly resource: "post" | "page";
  public readonly key: string;

  constructor(resource: "post" | "page", key: string) {
    super(`${resource} not found: ${key}`, "NOT_FOUND");
    this.name = "NotFoundError";
    this.resource = resource;
    this.key = key;
  }
}

/** 壊れた posts.json や I/O 失敗。ここでは回復せず呼び出し元へ投げる */
export class StorageError extends BlogError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, "STORAGE_ERROR", { cause });
    this.name = "StorageError";
    this.path = path;
  }
}

export class ImportError extends BlogError {
  public readonly path?: string;

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, "IMPORT_ERROR", { cause });
    this.name = "ImportError";
    this.path = path;
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}

export function isNotFoundError(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}
