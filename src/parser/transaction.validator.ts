import { err, ok, type Result } from "neverthrow";
import {
	CATEGORIES,
	type Category,
	type ParsedTransaction,
	type RegularTransaction,
	TRANSACTION_KINDS,
	type TransactionCandidate,
	type TransactionKind,
	type TransferTransaction,
} from "../types/types";
import { roundAmount } from "./amount.normalizer";
import { InvalidAmountError } from "./errors";
import { classifyCategory } from "./keyword.classifier";
import type { KeywordTables } from "./keyword.tables";

/**
 * Final normalization applied to the output of either parser path.
 * Running it on its own output returns an equal value.
 */
export function validateTransaction(
	candidate: TransactionCandidate,
	tables: KeywordTables,
): Result<ParsedTransaction, InvalidAmountError> {
	const amount = normalizeAmount(candidate.amount);
	if (amount === undefined) {
		return err(new InvalidAmountError(candidate.amount));
	}

	const kind = normalizeKind(candidate.type, tables);
	const note = candidate.note?.trim() || tables.notePlaceholder;

	if (kind === "transfer") {
		const transfer: TransferTransaction = {
			kind,
			amount,
			sourceAccount: normalizeAccount(candidate.sourceAccount, tables),
			destinationAccount: normalizeAccount(candidate.destinationAccount, tables),
			category: "transfer",
			note,
		};
		return ok(Object.freeze(transfer));
	}

	const regular: RegularTransaction = {
		kind,
		amount,
		account: normalizeAccount(candidate.account, tables),
		category: normalizeCategory(candidate.category, tables),
		note,
	};
	return ok(Object.freeze(regular));
}

export function normalizeKind(type: string, tables: KeywordTables): TransactionKind {
	const label = type.trim().toLowerCase();
	if (isOneOf(TRANSACTION_KINDS, label)) return label;
	return Object.hasOwn(tables.kindAliases, label) ? tables.kindAliases[label] : "expense";
}

function normalizeAmount(value: number | string): number | undefined {
	const amount = typeof value === "number" ? value : Number(value.trim());
	if (!Number.isFinite(amount) || amount <= 0) return undefined;
	const rounded = roundAmount(amount);
	return rounded > 0 ? rounded : undefined;
}

function normalizeAccount(name: string | undefined, tables: KeywordTables): string {
	return name?.trim().toLowerCase() || tables.cashAccount;
}

export function normalizeCategory(label: string | undefined, tables: KeywordTables): Category {
	const value = label?.trim().toLowerCase();
	if (!value) return "other";
	if (isOneOf(CATEGORIES, value)) return value;
	if (Object.hasOwn(tables.categoryAliases, value)) return tables.categoryAliases[value];
	return classifyCategory(value, tables);
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
	return values.some((candidate) => candidate === value);
}
