import type { Result } from "neverthrow";
import type { TransactionCandidate } from "../types/types";
import { resolveRegularAccount, resolveTransferAccounts } from "./account.resolver";
import { extractAmount, stripAmount } from "./amount.normalizer";
import type { InvalidAmountError, NoAmountError } from "./errors";
import {
	classifyCategory,
	classifyKind,
	detectTransfer,
	tokenize,
} from "./keyword.classifier";
import type { ParserConfig } from "./parser.config";

/**
 * Keyword and regex parser. Needs no model and only fails when the text
 * carries no usable amount.
 */
class FallbackParser {
	constructor(private readonly config: ParserConfig) {}

	parse(text: string): Result<TransactionCandidate, NoAmountError | InvalidAmountError> {
		const { tables } = this.config;
		const lower = text.toLowerCase();
		const tokens = tokenize(text);
		const kind = classifyKind(lower, tokens, tables);

		return extractAmount(text).map((amount): TransactionCandidate => {
			const note = stripAmount(text, amount);

			if (kind === "transfer") {
				const subtype = detectTransfer(lower, tokens, tables) ?? "transfer";
				const accounts = resolveTransferAccounts(tokens, subtype, tables);
				return { type: kind, amount: amount.value, category: "transfer", note, ...accounts };
			}

			const category = kind === "income" ? "salary" : classifyCategory(lower, tables);
			return {
				type: kind,
				amount: amount.value,
				account: resolveRegularAccount(lower, category, tables),
				category,
				note,
			};
		});
	}
}

export default FallbackParser;
