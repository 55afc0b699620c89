import { err, errAsync, ok, type Result, ResultAsync } from "neverthrow";
import { z } from "zod";
import type { TextOracle, TransactionCandidate } from "../types/types";
import { OracleError } from "./errors";
import type FallbackParser from "./fallback.parser";
import { hasTransferPhrasing, tokenize } from "./keyword.classifier";
import type { ParserConfig } from "./parser.config";
import { renderPrompt } from "./prompt";

const amount = z.union([z.number(), z.string()]);
const isTransferType = (type: string) => type.trim().toLowerCase() === "transfer";

const TransferPayloadSchema = z
	.object({
		type: z.string().refine(isTransferType),
		amount,
		source_account: z.string(),
		destination_account: z.string(),
		note: z.string(),
		category: z.string().optional(),
	})
	.strict();

const RegularPayloadSchema = z
	.object({
		type: z.string().refine((type) => !isTransferType(type)),
		amount,
		account: z.string(),
		category: z.string(),
		note: z.string(),
	})
	.strict();

const OraclePayloadSchema = z.union([TransferPayloadSchema, RegularPayloadSchema]);

type OraclePayload = z.infer<typeof OraclePayloadSchema>;

/** Removes a surrounding ``` / ```json fence. */
export function stripCodeFence(text: string): string {
	return text
		.trim()
		.replace(/^```(?:json)?/i, "")
		.replace(/```$/, "")
		.trim();
}

/**
 * Asks the language model for a transaction. Any failure is returned as an
 * OracleError so the caller can fall back to keyword parsing.
 */
class ModelParser {
	constructor(
		private readonly config: ParserConfig,
		private readonly oracle: TextOracle | undefined,
		private readonly fallback: FallbackParser,
	) {}

	parse(text: string): ResultAsync<TransactionCandidate, OracleError> {
		const oracle = this.oracle;
		if (!oracle) {
			return errAsync(new OracleError("No language model configured"));
		}

		const prompt = renderPrompt(this.config.promptTemplate, text);
		return ResultAsync.fromPromise(
			Promise.resolve().then(() => oracle.generate(prompt)),
			(error) => new OracleError("Language model request failed", { cause: error }),
		).andThen((response) => this.interpret(text, response));
	}

	private interpret(text: string, response: string): Result<TransactionCandidate, OracleError> {
		const body = stripCodeFence(response);
		if (!body) {
			return err(new OracleError("Empty response from language model"));
		}

		let data: unknown;
		try {
			data = JSON.parse(body);
		} catch (error) {
			return err(new OracleError("Language model returned invalid JSON", { cause: error }));
		}
		const payload: unknown = Array.isArray(data) && data.length === 1 ? data[0] : data;

		const corrected = this.crossCheckTransfer(text, payload);
		if (corrected) {
			return ok(corrected);
		}

		const decoded = OraclePayloadSchema.safeParse(payload);
		if (!decoded.success) {
			return err(
				new OracleError(`Language model returned an incomplete transaction: ${decoded.error.message}`),
			);
		}
		return ok(toCandidate(decoded.data));
	}

	/**
	 * Keyword tables catch transfer phrasing the model misses. When they fire
	 * and the model answered with another type, the keyword result replaces it,
	 * provided that result is a transfer between two different accounts.
	 */
	private crossCheckTransfer(text: string, payload: unknown): TransactionCandidate | undefined {
		const { tables } = this.config;
		if (!hasTransferPhrasing(text, tokenize(text), tables)) return undefined;
		if (declaredType(payload) === "transfer") return undefined;

		console.warn(`Model missed transfer phrasing in "${text}", checking keyword parser`);
		return this.fallback.parse(text).match(
			(candidate) =>
				candidate.type === "transfer" && candidate.sourceAccount !== candidate.destinationAccount
					? candidate
					: undefined,
			() => undefined,
		);
	}
}

function declaredType(payload: unknown): string | undefined {
	if (typeof payload !== "object" || payload === null || !("type" in payload)) {
		return undefined;
	}
	return typeof payload.type === "string" ? payload.type.trim().toLowerCase() : undefined;
}

function toCandidate(payload: OraclePayload): TransactionCandidate {
	if ("source_account" in payload) {
		return {
			type: payload.type,
			amount: payload.amount,
			sourceAccount: payload.source_account,
			destinationAccount: payload.destination_account,
			note: payload.note,
		};
	}
	return {
		type: payload.type,
		amount: payload.amount,
		account: payload.account,
		category: payload.category,
		note: payload.note,
	};
}

export default ModelParser;
