import type {
	AccountKind,
	Category,
	TransactionKind,
	TransferSubtype,
} from "../types/types";
import type { KeywordTables } from "./keyword.tables";

export type AccountMatch = {
	name: string;
	/** Undefined when the word is not a known account keyword. */
	kind?: AccountKind;
};

export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.split(/\s+/)
		.map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
		.filter((token) => token.length > 0);
}

export function containsAny(text: string, triggers: readonly string[]): boolean {
	return triggers.some((trigger) => text.includes(trigger));
}

export function isAmountToken(token: string): boolean {
	return /\d/.test(token);
}

export function isActionWord(token: string, tables: KeywordTables): boolean {
	return tables.actionWords.includes(token);
}

/** Account named by a single word; unknown words come back as custom accounts. */
export function detectAccountFromWord(word: string, tables: KeywordTables): AccountMatch {
	const token = word.toLowerCase();
	if (isActionWord(token, tables)) {
		return { name: tables.cashAccount, kind: "cash" };
	}
	const entry = tables.accounts.find(
		({ triggers, wordTriggers }) => triggers.includes(token) || wordTriggers?.includes(token),
	);
	if (entry) {
		return { name: entry.name, kind: entry.kind };
	}
	return { name: token };
}

export function isKnownAccountWord(word: string | undefined, tables: KeywordTables): boolean {
	if (word === undefined || isActionWord(word, tables)) return false;
	return detectAccountFromWord(word, tables).kind !== undefined;
}

export function detectAccountInText(
	text: string,
	tables: KeywordTables,
): AccountMatch | undefined {
	const lower = text.toLowerCase();
	const entry = tables.accounts.find(({ triggers }) => containsAny(lower, triggers));
	return entry ? { name: entry.name, kind: entry.kind } : undefined;
}

export function inferAccountKind(name: string, tables: KeywordTables): AccountKind {
	return detectAccountInText(name, tables)?.kind ?? "bank";
}

/**
 * Transfer phrasing in the text, or undefined for a regular transaction.
 * Trigger phrases win over the positional `X ke Y` / `dari X ke Y` form.
 */
export function detectTransfer(
	text: string,
	tokens: readonly string[],
	tables: KeywordTables,
): TransferSubtype | undefined {
	const lower = text.toLowerCase();
	const entry = tables.transferTriggers.find(({ triggers }) => containsAny(lower, triggers));
	if (entry) return entry.label;
	return hasAccountConnector(tokens, tables) ? "transfer" : undefined;
}

/**
 * Transfer phrasing strong enough to overrule a model answer. Bare `kirim`,
 * `tarik` and `ambil` are not in the cross-check table.
 */
export function hasTransferPhrasing(
	text: string,
	tokens: readonly string[],
	tables: KeywordTables,
): boolean {
	return containsAny(text.toLowerCase(), tables.crossCheckTriggers) || hasAccountConnector(tokens, tables);
}

function hasAccountConnector(tokens: readonly string[], tables: KeywordTables): boolean {
	const { from, to } = tables.connectors;
	const toIndex = tokens.findIndex((token) => to.includes(token));
	if (toIndex === -1 || !isKnownAccountWord(tokens[toIndex + 1], tables)) {
		return false;
	}

	const fromIndex = tokens.findIndex((token) => from.includes(token));
	if (fromIndex !== -1 && fromIndex < toIndex) {
		return isKnownAccountWord(tokens[fromIndex + 1], tables);
	}

	return isKnownAccountWord(wordBeforeConnector(tokens, toIndex, tables), tables);
}

/**
 * The word right before a `to` connector, stepping back once over an action
 * word or amount (`Transfer BNI ke BCA`, `kirim 100k ke ovo`).
 */
export function wordBeforeConnector(
	tokens: readonly string[],
	toIndex: number,
	tables: KeywordTables,
): string | undefined {
	const skippable = (token: string) => isAmountToken(token) || isActionWord(token, tables);
	const previous: string | undefined = tokens[toIndex - 1];
	if (previous === undefined || !skippable(previous)) return previous;
	const earlier: string | undefined = tokens[toIndex - 2];
	return earlier === undefined || skippable(earlier) ? undefined : earlier;
}

export function classifyKind(
	text: string,
	tokens: readonly string[],
	tables: KeywordTables,
): TransactionKind {
	if (detectTransfer(text, tokens, tables)) return "transfer";
	if (containsAny(text.toLowerCase(), tables.incomeTriggers)) return "income";
	return "expense";
}

export function classifyCategory(text: string, tables: KeywordTables): Category {
	const lower = text.toLowerCase();
	const entry = tables.categoryTriggers.find(({ triggers }) => containsAny(lower, triggers));
	return entry?.label ?? "other";
}

/** Whether a plain chat message should be treated as transaction input. */
export function looksLikeTransaction(text: string, tables: KeywordTables): boolean {
	const lower = text.toLowerCase();
	if (/\d\s*(?:k|rb|ribu|jt|juta)\b/.test(lower)) return true;
	return /\d/.test(lower) && containsAny(lower, tables.transactionHints);
}
