export type EstimationErrorKind = "NotFound" | "IOError" | "Cancelled";

/**
 * Failure of a whole estimation. Returned inside an {@link EstimationOutcome},
 * never alongside a partial result.
 */
export class EstimationError extends Error {
    readonly kind: EstimationErrorKind;
    readonly path: string | null;

    constructor(kind: EstimationErrorKind, message: string, path: string | null = null, cause?: unknown) {
        super(message, cause === undefined ? undefined : {cause});
        this.name = "EstimationError";
        this.kind = kind;
        this.path = path;
    }

    static notFound(path: string, cause?: unknown) {
        return new EstimationError("NotFound", `G-code file not found: ${path}`, path, cause);
    }

    static io(path: string | null, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new EstimationError("IOError", `failed to read G-code${path ? ` from ${path}` : ""}: ${reason}`, path, cause);
    }

    static cancelled(path: string | null) {
        return new EstimationError("Cancelled", `G-code analysis cancelled${path ? ` for ${path}` : ""}`, path);
    }
}

export type EstimationOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: EstimationError };

export function isEstimationError(value: unknown): value is EstimationError {
    return value instanceof EstimationError;
}
