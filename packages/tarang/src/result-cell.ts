/**
 * A completion cell that can be settled exactly once.
 *
 * Several handshake stages race to report the outcome of one connect; the
 * first `succeed` or `fail` wins and every later call returns false.
 */

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export class ResultCell<T> {
	readonly promise: Promise<T>;
	private readonly settle: (outcome: Outcome<T>) => void;
	private settled = false;

	constructor() {
		let settle: (outcome: Outcome<T>) => void = () => {};
		this.promise = new Promise<T>((resolve, reject) => {
			settle = (outcome) => (outcome.ok ? resolve(outcome.value) : reject(outcome.error));
		});
		this.settle = settle;
	}

	get isSettled(): boolean {
		return this.settled;
	}

	/** Returns false when the cell was already settled. */
	succeed(value: T): boolean {
		if (this.settled) return false;
		this.settled = true;
		this.settle({ ok: true, value });
		return true;
	}

	/** Returns false when the cell was already settled. */
	fail(error: unknown): boolean {
		if (this.settled) return false;
		this.settled = true;
		this.settle({ ok: false, error });
		return true;
	}
}
