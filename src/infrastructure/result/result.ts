/**
 * Generic result type
 * Represents the result of an operation that can succeed or fail
 */
export class Result<T> {
	readonly success: boolean;

	/**
	 * Result data (only available if success is true)
	 */
	readonly data?: T;

	/**
	 * Error information (only available if success is false)
	 */
	readonly error?: Error;

	private constructor(success: boolean, data?: T, error?: Error) {
		this.success = success;
		this.data = data;
		this.error = error;
	}

	static success<T>(data: T): Result<T> {
		return new Result<T>(true, data);
	}

	static failure<T>(error: Error): Result<T> {
		return new Result<T>(false, undefined, error);
	}

	/**
	 * Maps the result data to a new type
	 * @param fn - Mapping function
	 */
	map<U>(fn: (data: T) => U): Result<U> {
		if (this.success && this.data !== undefined) {
			return Result.success(fn(this.data));
		}
		return Result.failure<U>(this.error || new Error('Unknown error'));
	}

	/**
	 * Returns the data of a successful result, or the fallback otherwise
	 */
	getOrElse(fallback: T): T {
		return this.success && this.data !== undefined ? this.data : fallback;
	}

	onSuccess(fn: (data: T) => void): Result<T> {
		if (this.success && this.data !== undefined) {
			fn(this.data);
		}
		return this;
	}
}
