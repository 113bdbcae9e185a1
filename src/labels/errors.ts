import {
  type LanguageCode,
  LanguageCodeSchema,
  type TagCategory,
  TagCategorySchema,
} from "@/types";

/**
 * Raised when a language code, category code or tag record cannot be decoded.
 * `field` is the dotted path of the offending value inside the record.
 */
export class LabelDecodeError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly recordId?: string,
  ) {
    super(message);
    this.name = "LabelDecodeError";
  }
}

export type LabelIOOperation = "read" | "write";

/**
 * Raised when a tag file cannot be read or written
 */
export class LabelIOError extends Error {
  constructor(
    message: string,
    public readonly operation: LabelIOOperation,
    public readonly path: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = "LabelIOError";
  }
}

/**
 * Wrap a failed fs call, keeping the Node error code (ENOENT, EACCES, ...)
 */
export function toLabelIOError(
  error: unknown,
  operation: LabelIOOperation,
  path: string,
): LabelIOError {
  const reason = error instanceof Error ? error.message : "Unknown error";
  const code =
    error instanceof Error && "code" in error && typeof error.code === "string"
      ? error.code
      : undefined;
  return new LabelIOError(
    `Failed to ${operation} tag file ${path}: ${reason}`,
    operation,
    path,
    code,
  );
}

export function parseLanguageCode(value: string): LanguageCode {
  const result = LanguageCodeSchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new LabelDecodeError(
      `Unknown language code "${value}"`,
      "language",
      value,
    );
  }
  return result.data;
}

export function parseTagCategory(value: string): TagCategory {
  const result = TagCategorySchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new LabelDecodeError(
      `Unknown tag category "${value}"`,
      "category",
      value,
    );
  }
  return result.data;
}
