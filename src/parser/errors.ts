export type TransactionErrorCode =
	| "EMPTY_INPUT"
	| "NO_AMOUNT"
	| "INVALID_AMOUNT"
	| "ORACLE_FAILURE"
	| "UNPARSEABLE"
	| "LEDGER_FAILURE"
	| "INSUFFICIENT_BALANCE";

export class TransactionError extends Error {
	readonly code: TransactionErrorCode;

	constructor(code: TransactionErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

export class EmptyInputError extends TransactionError {
	constructor() {
		super("EMPTY_INPUT", "Transaction text is empty.");
	}
}

export class NoAmountError extends TransactionError {
	constructor(readonly input: string) {
		super("NO_AMOUNT", `No amount found in "${input}".`);
	}
}

export class InvalidAmountError extends TransactionError {
	constructor(readonly value: unknown) {
		super("INVALID_AMOUNT", `Amount must be a positive number, got ${JSON.stringify(value) ?? String(value)}.`);
	}
}

export class OracleError extends TransactionError {
	constructor(message: string, options?: ErrorOptions) {
		super("ORACLE_FAILURE", message, options);
	}
}

/** Both parser paths failed for the same input. */
export class UnparseableTransactionError extends TransactionError {
	constructor(
		readonly input: string,
		readonly causes: readonly TransactionError[],
	) {
		super(
			"UNPARSEABLE",
			`Unable to parse "${input}". Please try a simpler format like 'bakso 15k cash'.`,
			{ cause: causes },
		);
	}
}

export class LedgerError extends TransactionError {
	constructor(message: string, options?: ErrorOptions) {
		super("LEDGER_FAILURE", message, options);
	}
}

export class InsufficientBalanceError extends TransactionError {
	constructor(
		readonly account: string,
		readonly attempted: number,
		readonly balance: number,
	) {
		super(
			"INSUFFICIENT_BALANCE",
			`Insufficient balance in ${account}: ${balance} available, ${attempted} needed.`,
		);
	}
}
