import { describe, expect, it } from "vitest";
import FallbackParser from "./fallback.parser";
import { createParserConfig } from "./parser.config";

const parser = new FallbackParser(createParserConfig());

describe("FallbackParser", () => {
	it("parses an expense with an explicit account", () => {
		expect(parser.parse("bakso 15k pake cash")._unsafeUnwrap()).toEqual({
			type: "expense",
			amount: 15_000,
			account: "cash",
			category: "food",
			note: "bakso pake cash",
		});
	});

	it("parses income into the salary category", () => {
		expect(parser.parse("gaji bulan ini 5jt ke bank")._unsafeUnwrap()).toEqual({
			type: "income",
			amount: 5_000_000,
			account: "bank",
			category: "salary",
			note: "gaji bulan ini ke bank",
		});
	});

	it("keeps an expense with ke and a non-account word regular", () => {
		expect(parser.parse("gojek ke kantor 20rb")._unsafeUnwrap()).toEqual({
			type: "expense",
			amount: 20_000,
			account: "cash",
			category: "transport",
			note: "gojek ke kantor",
		});
	});

	it("parses a withdrawal", () => {
		expect(parser.parse("Tarik tunai BRI 1jt")._unsafeUnwrap()).toEqual({
			type: "transfer",
			amount: 1_000_000,
			sourceAccount: "bri",
			destinationAccount: "cash",
			category: "transfer",
			note: "Tarik tunai BRI",
		});
	});

	it("parses a top-up", () => {
		expect(parser.parse("Topup gopay 30k")._unsafeUnwrap()).toEqual({
			type: "transfer",
			amount: 30_000,
			sourceAccount: "cash",
			destinationAccount: "gopay",
			category: "transfer",
			note: "Topup gopay",
		});
	});

	it("uses the wallet named in a shopping message", () => {
		expect(parser.parse("beli buku 50rb pake dana")._unsafeUnwrap()).toEqual({
			type: "expense",
			amount: 50_000,
			account: "dana",
			category: "shopping",
			note: "beli buku pake dana",
		});
	});

	it("fails without an amount", () => {
		expect(parser.parse("bakso enak")._unsafeUnwrapErr().code).toBe("NO_AMOUNT");
	});
});
