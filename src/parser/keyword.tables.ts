import { z } from "zod";
import {
	ACCOUNT_KINDS,
	CATEGORIES,
	TRANSACTION_KINDS,
	TRANSFER_SUBTYPES,
} from "../types/types";
import keywords from "./keywords.json";

const triggers = z.array(z.string().min(1)).nonempty();

const KeywordTablesSchema = z
	.object({
		cashAccount: z.string().min(1),
		notePlaceholder: z.string().min(1),
		transferTriggers: z.array(
			z.object({ label: z.enum(TRANSFER_SUBTYPES), triggers }).strict(),
		),
		crossCheckTriggers: triggers,
		connectors: z.object({ from: triggers, to: triggers }).strict(),
		actionWords: z.array(z.string().min(1)),
		incomeTriggers: triggers,
		categoryTriggers: z.array(
			z.object({ label: z.enum(CATEGORIES), triggers }).strict(),
		),
		accounts: z.array(
			z
				.object({
					name: z.string().min(1),
					kind: z.enum(ACCOUNT_KINDS),
					triggers,
					/** Matched only as a whole word, never inside running text. */
					wordTriggers: z.array(z.string().min(1)).optional(),
				})
				.strict(),
		),
		shoppingPlatforms: z.array(
			z.object({ platform: z.string().min(1), account: z.string().min(1) }).strict(),
		),
		paymentOverrides: z.array(
			z.object({ account: z.string().min(1), triggers }).strict(),
		),
		kindAliases: z.record(z.enum(TRANSACTION_KINDS)),
		categoryAliases: z.record(z.enum(CATEGORIES)),
		transactionHints: z.array(z.string().min(1)),
	})
	.strict();

export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

/**
 * Decodes a keyword table resource. Entry order inside every list is the
 * tie-break order used by the classifiers.
 */
export function loadKeywordTables(source: unknown = keywords): KeywordTables {
	const parsed = KeywordTablesSchema.safeParse(source);
	if (!parsed.success) {
		throw new Error(`Invalid keyword tables: ${parsed.error.message}`);
	}
	return deepFreeze(parsed.data);
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object") {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}
