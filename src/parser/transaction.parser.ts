import { errAsync, type Result, type ResultAsync } from "neverthrow";
import type {
	ParsedTransaction,
	TextOracle,
	TransactionCandidate,
	UserContext,
} from "../types/types";
import { EmptyInputError, type TransactionError, UnparseableTransactionError } from "./errors";
import FallbackParser from "./fallback.parser";
import ModelParser from "./model.parser";
import type { ParserConfig } from "./parser.config";
import { validateTransaction } from "./transaction.validator";

export type BatchParseResult = {
	input: string;
	result: Result<ParsedTransaction, TransactionError>;
};

/**
 * Entry point for turning chat text into a transaction: the language model
 * first, keyword parsing when the model path fails, validation last.
 */
class TransactionParser {
	private readonly fallbackParser: FallbackParser;
	private readonly modelParser: ModelParser;

	constructor(
		private readonly config: ParserConfig,
		oracle?: TextOracle,
	) {
		this.fallbackParser = new FallbackParser(config);
		this.modelParser = new ModelParser(config, oracle, this.fallbackParser);
	}

	cleanInput(rawText: string): string {
		return rawText.trim().replace(this.config.commandPrefix, "").trim();
	}

	parse(rawText: string, user?: UserContext): ResultAsync<ParsedTransaction, TransactionError> {
		const text = this.cleanInput(rawText);
		if (!text) {
			return errAsync(new EmptyInputError());
		}
		const who = user ? ` (user ${user.userId})` : "";
		const validate = (candidate: TransactionCandidate) =>
			validateTransaction(candidate, this.config.tables);

		// A model answer that fails validation counts as a model failure.
		return this.modelParser
			.parse(text)
			.andThen(validate)
			.orElse((modelError) => {
				console.warn(`Model parsing failed for "${text}"${who}: ${modelError.message}, trying keyword parser`);
				return this.fallbackParser
					.parse(text)
					.andThen(validate)
					.mapErr((fallbackError) => {
						console.error(`Both parsers failed for "${text}"${who}: ${fallbackError.message}`);
						return new UnparseableTransactionError(text, [modelError, fallbackError]);
					});
			})
			.map((transaction) => {
				console.log(`Parsed "${text}"${who}:`, transaction);
				return transaction;
			});
	}

	/** Parses each input in turn; one failure does not stop the rest. */
	async parseMany(inputs: readonly string[], user?: UserContext): Promise<BatchParseResult[]> {
		const results: BatchParseResult[] = [];
		for (const input of inputs) {
			results.push({ input, result: await this.parse(input, user) });
		}
		return results;
	}
}

export default TransactionParser;
