import { InsufficientBalanceError, type TransactionError } from "../parser/errors";
import { looksLikeTransaction } from "../parser/keyword.classifier";
import type { ParserConfig } from "../parser/parser.config";
import type TransactionParser from "../parser/transaction.parser";
import type { LedgerService, ParsedTransaction, UserContext } from "../types/types";
import { formatAccounts, formatRupiah, formatTransaction } from "../utils/formatters";

export const HELP_TEXT = [
	"Send a transaction in plain words and I will record it.",
	"",
	"Examples:",
	"/input bakso 15k cash",
	"gaji 5jt ke bca",
	"Transfer BNI ke BCA 1jt",
	"Tarik tunai BRI 500rb",
	"Topup gopay 30k",
	"",
	"Several transactions can go in one message, one per line.",
	"/accounts shows your account balances.",
].join("\n");

/** Turns one chat message into the reply text. */
class TransactionHandler {
	constructor(
		private readonly parser: TransactionParser,
		private readonly ledger: LedgerService,
		private readonly config: ParserConfig,
	) {}

	/** `/input ...`: always treated as transaction input. */
	async handleCommand(text: string, user: UserContext): Promise<string> {
		return this.record(this.parser.cleanInput(text), user);
	}

	/** Plain chat text: recorded only when it looks like a transaction. */
	async handleText(text: string, user: UserContext): Promise<string> {
		const trimmed = text.trim();
		if (!trimmed || trimmed.startsWith("/")) {
			return HELP_TEXT;
		}
		if (!looksLikeTransaction(trimmed, this.config.tables)) {
			return `"${trimmed}" does not look like a transaction.\n\n${HELP_TEXT}`;
		}
		return this.record(trimmed, user);
	}

	async handleAccounts(_text: string, _user: UserContext): Promise<string> {
		return formatAccounts(await this.ledger.getAccounts());
	}

	private async record(text: string, user: UserContext): Promise<string> {
		const lines = text
			.split("\n")
			.map((line) => line.trim())
			.filter((line) => line.length > 0);
		if (lines.length <= 1) {
			return this.recordOne(text, user);
		}

		const replies: string[] = [];
		for (const { input, result } of await this.parser.parseMany(lines, user)) {
			replies.push(
				await result.match(
					(transaction) => this.commit(input, transaction, user),
					(error) => Promise.resolve(parseFailure(input, error)),
				),
			);
		}
		return replies.join("\n\n");
	}

	private async recordOne(text: string, user: UserContext): Promise<string> {
		const result = await this.parser.parse(text, user);
		if (result.isErr()) {
			return parseFailure(text, result.error);
		}
		return this.commit(text, result.value, user);
	}

	private async commit(input: string, transaction: ParsedTransaction, user: UserContext): Promise<string> {
		try {
			const id = await this.ledger.commit(transaction, user);
			return formatTransaction(transaction, id);
		} catch (error) {
			if (error instanceof InsufficientBalanceError) {
				return [
					`Transaction failed: not enough balance in ${error.account}.`,
					`Input: ${input}`,
					`Available: ${formatRupiah(error.balance)}, needed: ${formatRupiah(error.attempted)}`,
					"Check /accounts or use another account.",
				].join("\n");
			}
			console.error(`Error recording "${input}" for user ${user.userId}:`, error);
			return [
				"Transaction failed: it could not be saved.",
				`Input: ${input}`,
				error instanceof Error ? `Error: ${error.message}` : "",
			]
				.filter(Boolean)
				.join("\n");
		}
	}
}

function parseFailure(input: string, error: TransactionError): string {
	if (error.code === "EMPTY_INPUT") {
		return `Please add a transaction after the command.\n\n${HELP_TEXT}`;
	}
	return [
		"Could not understand the transaction.",
		`Input: ${input}`,
		`Error: ${error.message}`,
		"Try a simple format like: bakso 15k cash",
	].join("\n");
}

export default TransactionHandler;
