import { beforeEach, describe, expect, it, vi } from "vitest";
import { InsufficientBalanceError, LedgerError } from "../parser/errors";
import { createParserConfig } from "../parser/parser.config";
import TransactionParser from "../parser/transaction.parser";
import type { LedgerService } from "../types/types";
import TransactionHandler, { HELP_TEXT } from "./transaction.handler";

const config = createParserConfig();
const user = { userId: 42, username: "tester" };

const commit = vi.fn<LedgerService["commit"]>();
const getAccounts = vi.fn<LedgerService["getAccounts"]>();
const handler = new TransactionHandler(new TransactionParser(config), { commit, getAccounts }, config);

const baksoReply = [
	"Expense saved!",
	"Amount: Rp 15.000",
	"Account: cash",
	"Category: food",
	"Note: bakso pake cash",
	"Transaction ID: tx-1",
].join("\n");

describe("TransactionHandler", () => {
	beforeEach(() => {
		commit.mockReset();
		getAccounts.mockReset();
		commit.mockResolvedValue("tx-1");
	});

	it("records a plain message that looks like a transaction", async () => {
		expect(await handler.handleText("bakso 15k pake cash", user)).toBe(baksoReply);
		expect(commit).toHaveBeenCalledWith(
			{ kind: "expense", amount: 15000, account: "cash", category: "food", note: "bakso pake cash" },
			user,
		);
	});

	it("records the /input command", async () => {
		expect(await handler.handleCommand("/input bakso 15k pake cash", user)).toBe(baksoReply);
	});

	it("replies with a transfer summary", async () => {
		expect(await handler.handleText("Tarik tunai BRI 1jt", user)).toBe(
			[
				"Transfer saved!",
				"From: bri",
				"To: cash",
				"Amount: Rp 1.000.000",
				"Note: Tarik tunai BRI",
				"Transaction ID: tx-1",
			].join("\n"),
		);
	});

	it("shows help for unknown commands", async () => {
		expect(await handler.handleText("/unknown", user)).toBe(HELP_TEXT);
		expect(commit).not.toHaveBeenCalled();
	});

	it("ignores small talk", async () => {
		expect(await handler.handleText("halo apa kabar", user)).toBe(
			`"halo apa kabar" does not look like a transaction.\n\n${HELP_TEXT}`,
		);
		expect(commit).not.toHaveBeenCalled();
	});

	it("asks for text after an empty command", async () => {
		expect(await handler.handleCommand("/input", user)).toBe(
			`Please add a transaction after the command.\n\n${HELP_TEXT}`,
		);
	});

	it("explains a parse failure", async () => {
		expect(await handler.handleCommand("/input halo", user)).toBe(
			[
				"Could not understand the transaction.",
				"Input: halo",
				"Error: Unable to parse \"halo\". Please try a simpler format like 'bakso 15k cash'.",
				"Try a simple format like: bakso 15k cash",
			].join("\n"),
		);
	});

	it("answers each line of a multi-line message", async () => {
		const reply = await handler.handleText("bakso 15k\nhalo", user);

		expect(reply).toBe(
			[
				[
					"Expense saved!",
					"Amount: Rp 15.000",
					"Account: cash",
					"Category: food",
					"Note: bakso",
					"Transaction ID: tx-1",
				].join("\n"),
				[
					"Could not understand the transaction.",
					"Input: halo",
					"Error: Unable to parse \"halo\". Please try a simpler format like 'bakso 15k cash'.",
					"Try a simple format like: bakso 15k cash",
				].join("\n"),
			].join("\n\n"),
		);
		expect(commit).toHaveBeenCalledTimes(1);
	});

	it("reports an insufficient balance", async () => {
		commit.mockRejectedValue(new InsufficientBalanceError("cash", 15000, 10000));

		expect(await handler.handleText("bakso 15k pake cash", user)).toBe(
			[
				"Transaction failed: not enough balance in cash.",
				"Input: bakso 15k pake cash",
				"Available: Rp 10.000, needed: Rp 15.000",
				"Check /accounts or use another account.",
			].join("\n"),
		);
	});

	it("reports a ledger failure", async () => {
		commit.mockRejectedValue(new LedgerError("Could not save the transaction to the budget."));

		expect(await handler.handleText("bakso 15k pake cash", user)).toBe(
			[
				"Transaction failed: it could not be saved.",
				"Input: bakso 15k pake cash",
				"Error: Could not save the transaction to the budget.",
			].join("\n"),
		);
	});

	it("lists account balances", async () => {
		getAccounts.mockResolvedValue([{ name: "bca", kind: "bank", balance: 1250000.4 }]);

		expect(await handler.handleAccounts("/accounts", user)).toBe("Account balances:\nbca (bank): Rp 1.250.000");
	});
});
