import { describe, expect, it } from "vitest";
import type { ParsedTransaction, TransactionCandidate } from "../types/types";
import { loadKeywordTables } from "./keyword.tables";
import { normalizeCategory, normalizeKind, validateTransaction } from "./transaction.validator";

const tables = loadKeywordTables();

const toCandidate = (transaction: ParsedTransaction): TransactionCandidate =>
	transaction.kind === "transfer"
		? {
				type: transaction.kind,
				amount: transaction.amount,
				sourceAccount: transaction.sourceAccount,
				destinationAccount: transaction.destinationAccount,
				category: transaction.category,
				note: transaction.note,
			}
		: {
				type: transaction.kind,
				amount: transaction.amount,
				account: transaction.account,
				category: transaction.category,
				note: transaction.note,
			};

describe("validateTransaction", () => {
	it("normalizes aliases, casing and string amounts", () => {
		const result = validateTransaction(
			{ type: " Pemasukan ", amount: "5000000", account: " BCA ", category: "Gaji", note: " gaji " },
			tables,
		);
		expect(result._unsafeUnwrap()).toEqual({
			kind: "income",
			amount: 5_000_000,
			account: "bca",
			category: "salary",
			note: "gaji",
		});
	});

	it("rounds amounts to two decimals", () => {
		const result = validateTransaction(
			{ type: "expense", amount: 15000.456, account: "cash", category: "makanan", note: "kopi" },
			tables,
		);
		expect(result._unsafeUnwrap().amount).toBe(15000.46);
	});

	it("fills defaults for missing fields", () => {
		const result = validateTransaction({ type: "weird", amount: 10, category: "kopi susu" }, tables);
		expect(result._unsafeUnwrap()).toEqual({
			kind: "expense",
			amount: 10,
			account: "cash",
			category: "food",
			note: "Transaction",
		});
	});

	it("defaults blank transfer accounts to cash", () => {
		const result = validateTransaction(
			{ type: "TRANSFER", amount: 1_000_000, sourceAccount: "BRI", destinationAccount: " ", note: "" },
			tables,
		);
		expect(result._unsafeUnwrap()).toEqual({
			kind: "transfer",
			amount: 1_000_000,
			sourceAccount: "bri",
			destinationAccount: "cash",
			category: "transfer",
			note: "Transaction",
		});
	});

	it.each([0, -5, "abc", "", Number.NaN, Number.POSITIVE_INFINITY, 0.001])(
		"rejects the amount %s",
		(amount) => {
			const result = validateTransaction({ type: "expense", amount }, tables);
			expect(result._unsafeUnwrapErr().code).toBe("INVALID_AMOUNT");
		},
	);

	it("returns a frozen record", () => {
		const result = validateTransaction({ type: "expense", amount: 1 }, tables);
		expect(Object.isFrozen(result._unsafeUnwrap())).toBe(true);
	});

	it("returns an equal record when run on its own output", () => {
		const candidates: TransactionCandidate[] = [
			{ type: "Pengeluaran", amount: "20000.5", account: "GoPay", category: "transportasi", note: "ojek" },
			{ type: "transfer", amount: 300, sourceAccount: "BNI", destinationAccount: "OVO", note: "isi" },
		];
		for (const candidate of candidates) {
			const first = validateTransaction(candidate, tables)._unsafeUnwrap();
			const second = validateTransaction(toCandidate(first), tables)._unsafeUnwrap();
			expect(second).toEqual(first);
		}
	});
});

describe("normalizeKind", () => {
	it.each([
		["income", "income"],
		["EXPENSE", "expense"],
		["pengeluaran", "expense"],
		["refund", "expense"],
	])("maps %s to %s", (label, expected) => {
		expect(normalizeKind(label, tables)).toBe(expected);
	});
});

describe("normalizeCategory", () => {
	it.each([
		[undefined, "other"],
		["  ", "other"],
		["Transport", "transport"],
		["hiburan", "entertainment"],
		["xyz", "other"],
	])("maps %s to %s", (label, expected) => {
		expect(normalizeCategory(label, tables)).toBe(expected);
	});
});
