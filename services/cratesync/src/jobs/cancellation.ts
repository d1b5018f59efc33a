import { CancelledError } from "../errors.js";

/**
 * Cooperative stop flag. Jobs check it between tracks, never inside one.
 */
export class CancellationToken {
	private requested = false;

	get cancelled(): boolean {
		return this.requested;
	}

	cancel(): void {
		this.requested = true;
	}

	throwIfCancelled(): void {
		if (this.requested) {
			throw new CancelledError();
		}
	}
}
