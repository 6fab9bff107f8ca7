export type PermanentFailureReason =
  | "not_found"
  | "permission_denied"
  | "too_large"
  | "unsupported";

export type OperationSuccess<T> = { kind: "success"; value: T };

export type OperationTransientError = { kind: "transient"; error: Error };

export type OperationPermanentError = {
  kind: "permanent";
  reason: PermanentFailureReason;
  error: Error;
};

export type OperationCorrupted = { kind: "corrupted"; error: Error };

/**
 * Watch / Create / Process の各境界が返す結果。
 *
 * 例外の型を調べて分岐する代わりに `kind` タグで分岐する。
 */
export type OperationResult<T> =
  | OperationSuccess<T>
  | OperationTransientError
  | OperationPermanentError
  | OperationCorrupted;

export type OperationFailure =
  | OperationTransientError
  | OperationPermanentError
  | OperationCorrupted;

export const success = <T>(value: T): OperationSuccess<T> => ({
  kind: "success",
  value,
});

export const transient = (error: Error): OperationTransientError => ({
  kind: "transient",
  error,
});

export const permanent = (
  reason: PermanentFailureReason,
  error: Error
): OperationPermanentError => ({ kind: "permanent", reason, error });

export const corrupted = (error: Error): OperationCorrupted => ({
  kind: "corrupted",
  error,
});

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export const errorCode = (error: unknown): string | undefined => {
  if (error && typeof error === "object" && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
};

export const isNotFoundError = (error: unknown) => errorCode(error) === "ENOENT";

export const isPermissionError = (error: unknown) => {
  const code = errorCode(error);
  return code === "EACCES" || code === "EPERM";
};

/**
 * ファイル操作の例外を結果タグへ変換する。
 * ENOENT と EACCES / EPERM は再試行しても回復しないため permanent とする。
 */
export const classifyFileError = (error: unknown): OperationFailure => {
  const normalized = toError(error);

  if (isNotFoundError(error)) {
    return permanent("not_found", normalized);
  }

  if (isPermissionError(error)) {
    return permanent("permission_denied", normalized);
  }

  return transient(normalized);
};
