import type { AccountKind, Category, TransferSubtype } from "../types/types";
import {
	containsAny,
	detectAccountFromWord,
	detectAccountInText,
	isActionWord,
	isAmountToken,
	wordBeforeConnector,
} from "./keyword.classifier";
import type { KeywordTables } from "./keyword.tables";

export type TransferAccounts = {
	sourceAccount: string;
	destinationAccount: string;
};

/**
 * Source and destination of a transfer, from positional phrasing:
 * withdrawal/top-up phrasing > `dari X ke Y` > `X ke Y` > cash.
 */
export function resolveTransferAccounts(
	tokens: readonly string[],
	subtype: TransferSubtype,
	tables: KeywordTables,
): TransferAccounts {
	const { from, to } = tables.connectors;
	const fromIndex = tokens.findIndex((token) => from.includes(token));
	const toIndex = tokens.findIndex((token) => to.includes(token));
	const wordAt = (index: number): string | undefined => tokens[index];
	const accountOf = (word: string | undefined) =>
		word === undefined ? undefined : detectAccountFromWord(word, tables).name;

	let source: string | undefined;
	let destination: string | undefined;

	if (fromIndex !== -1 && toIndex !== -1 && toIndex > fromIndex) {
		source = accountOf(wordAt(fromIndex + 1));
		destination = accountOf(wordAt(toIndex + 1));
	} else if (toIndex !== -1) {
		source = accountOf(wordBeforeConnector(tokens, toIndex, tables));
		const next = wordAt(toIndex + 1);
		if (next !== undefined && !isActionWord(next, tables)) {
			destination = accountOf(next);
		}
	} else if (fromIndex !== -1) {
		source = accountOf(wordAt(fromIndex + 1));
	}

	if (subtype === "withdrawal") {
		destination = tables.cashAccount;
		source = firstAccount(tokens, tables, (kind) => kind === "bank") ?? source;
	} else if (subtype === "topup") {
		source = tables.cashAccount;
		destination = firstAccount(tokens, tables, (kind) => kind !== "cash") ?? destination;
	}

	return {
		sourceAccount: source || tables.cashAccount,
		destinationAccount: destination || tables.cashAccount,
	};
}

function firstAccount(
	tokens: readonly string[],
	tables: KeywordTables,
	accept: (kind: AccountKind) => boolean,
): string | undefined {
	for (const token of tokens) {
		if (isActionWord(token, tables) || isAmountToken(token)) continue;
		const { name, kind } = detectAccountFromWord(token, tables);
		if (kind && accept(kind)) return name;
	}
	return undefined;
}

/**
 * Account of an income or expense: named bank, then the payment method of a
 * shopping platform, then any account keyword, then cash.
 */
export function resolveRegularAccount(
	text: string,
	category: Category,
	tables: KeywordTables,
): string {
	const lower = text.toLowerCase();
	const detected = detectAccountInText(lower, tables);
	if (detected?.kind === "bank" && detected.name !== "bank") {
		return detected.name;
	}

	if (category === "shopping") {
		const platform = tables.shoppingPlatforms.find(({ platform }) => lower.includes(platform));
		if (platform) {
			const payment = tables.paymentOverrides.find(({ triggers }) => containsAny(lower, triggers));
			return payment?.account ?? platform.account;
		}
	}

	return detected?.name ?? tables.cashAccount;
}
