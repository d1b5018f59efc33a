import { delay } from "./delay.js";

export interface RetryConfig {
	maxAttempts?: number;
	initialDelay?: number;
	maxDelay?: number;
	backoffMultiplier?: number;
	shouldRetry?: (error: unknown) => boolean;
	onRetry?: (error: unknown, attempt: number, nextDelay: number) => void;
}

const DEFAULT_CONFIG: Required<RetryConfig> = {
	maxAttempts: 2,
	initialDelay: 1000,
	maxDelay: 30000,
	backoffMultiplier: 2,
	shouldRetry: () => true,
	onRetry: () => {},
};

/**
 * Run an operation, retrying with exponential backoff while shouldRetry allows it
 */
export async function retryWithBackoff<T>(operation: () => Promise<T>, config?: RetryConfig): Promise<T> {
	const finalConfig = { ...DEFAULT_CONFIG, ...config };

	for (let attempt = 1; ; attempt++) {
		try {
			return await operation();
		} catch (error) {
			if (attempt >= finalConfig.maxAttempts || !finalConfig.shouldRetry(error)) {
				throw error;
			}

			const nextDelay = Math.min(
				finalConfig.initialDelay * Math.pow(finalConfig.backoffMultiplier, attempt - 1),
				finalConfig.maxDelay
			);
			finalConfig.onRetry(error, attempt, nextDelay);
			await delay(nextDelay);
		}
	}
}
