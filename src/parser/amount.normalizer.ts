import { err, ok, type Result } from "neverthrow";
import { InvalidAmountError, NoAmountError } from "./errors";

export type AmountMatch = {
	value: number;
	/** Matched substring, as written in the input. */
	text: string;
	index: number;
};

type AmountPattern = {
	pattern: RegExp;
	multiplier: number;
};

const NUMBER = String.raw`(\d+(?:[.,]\d+)?)`;

// Priority order: the first pattern that matches anywhere wins.
const AMOUNT_PATTERNS: readonly AmountPattern[] = [
	{ pattern: new RegExp(String.raw`${NUMBER}\s*(?:jt|juta)`, "i"), multiplier: 1_000_000 },
	{ pattern: new RegExp(String.raw`${NUMBER}\s*(?:rb|ribu)`, "i"), multiplier: 1_000 },
	{ pattern: new RegExp(String.raw`${NUMBER}k(?![a-z])`, "i"), multiplier: 1_000 },
	{ pattern: new RegExp(NUMBER), multiplier: 1 },
];

export function extractAmount(
	text: string,
): Result<AmountMatch, NoAmountError | InvalidAmountError> {
	for (const { pattern, multiplier } of AMOUNT_PATTERNS) {
		const match = pattern.exec(text);
		if (!match) continue;

		const value = roundAmount(Number(match[1].replace(",", ".")) * multiplier);
		if (!(value > 0)) {
			return err(new InvalidAmountError(match[0]));
		}
		return ok({ value, text: match[0], index: match.index });
	}
	return err(new NoAmountError(text));
}

export function roundAmount(value: number): number {
	return Math.round(value * 100) / 100;
}

/** Input text with the amount removed and whitespace collapsed. */
export function stripAmount(text: string, amount: AmountMatch): string {
	const rest = text.slice(0, amount.index) + text.slice(amount.index + amount.text.length);
	return rest.replace(/\s+/g, " ").trim();
}
