/**
 * Typed failures for grid coordinate operations.
 *
 * Operations with preconditions return a GridResult instead of throwing, so
 * the caller decides whether to retry, propagate or recover.
 */

export type GridErrorCode =
    /** Direction index, axis, radius or index outside its valid range */
    | 'INVALID_ARGUMENT'
    /** Cube coordinate not summing to zero, doubled coordinate with odd col+row */
    | 'INVARIANT_VIOLATION'
    /** Zero, negative or non-finite size or width */
    | 'DEGENERATE_INPUT';

export class GridError extends Error {
    readonly code: GridErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: GridErrorCode, details?: Record<string, unknown>) {
        super(message);
        this.name = 'GridError';
        this.code = code;
        this.details = details;
    }
}

export type GridResult<T> =
    | { success: true; value: T }
    | { success: false; error: GridError };

export function gridSuccess<T>(value: T): GridResult<T> {
    return { success: true, value };
}

export function gridFailed<T>(
    code: GridErrorCode,
    message: string,
    details?: Record<string, unknown>,
): GridResult<T> {
    return { success: false, error: new GridError(message, code, details) };
}

/** Return the value or throw the carried GridError. */
export function unwrapGridResult<T>(result: GridResult<T>): T {
    if (!result.success) {
        throw result.error;
    }
    return result.value;
}

/** Map the value of a successful result, passing failures through untouched. */
export function mapGridResult<T, U>(result: GridResult<T>, fn: (value: T) => U): GridResult<U> {
    return result.success ? gridSuccess(fn(result.value)) : result;
}

export function isGridError(error: unknown): error is GridError {
    return error instanceof GridError;
}

export function toGridError(error: unknown, defaultCode: GridErrorCode = 'INVALID_ARGUMENT'): GridError {
    if (isGridError(error)) return error;
    if (error instanceof Error) {
        return new GridError(error.message, defaultCode, { originalError: error.name });
    }
    return new GridError(String(error), defaultCode);
}

// ═══════════════════════════════════════════════════════════════════════════
// PRECONDITIONS
// ═══════════════════════════════════════════════════════════════════════════

/** Reject zero, negative or non-finite sizes. */
export function checkSize(size: number, name = 'size'): GridResult<number> {
    if (!Number.isFinite(size) || size <= 0) {
        return gridFailed('DEGENERATE_INPUT', `${name} must be a positive finite number, got ${size}`, { [name]: size });
    }
    return gridSuccess(size);
}

/** Reject direction indices outside [0, count). */
export function checkDirection(direction: number, count: number): GridResult<number> {
    if (!Number.isInteger(direction) || direction < 0 || direction >= count) {
        return gridFailed(
            'INVALID_ARGUMENT',
            `direction must be an integer in 0-${count - 1}, got ${direction}`,
            { direction },
        );
    }
    return gridSuccess(direction);
}

export function checkRadius(radius: number): GridResult<number> {
    if (!Number.isInteger(radius) || radius < 0) {
        return gridFailed('INVALID_ARGUMENT', `radius must be a non-negative integer, got ${radius}`, { radius });
    }
    return gridSuccess(radius);
}
