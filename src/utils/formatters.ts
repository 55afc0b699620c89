import type { AccountRecord, ParsedTransaction } from "../types/types";

const rupiah = new Intl.NumberFormat("id-ID", { maximumFractionDigits: 0 });

export function formatRupiah(amount: number): string {
	return `Rp ${rupiah.format(Math.round(amount))}`;
}

export function formatTransaction(transaction: ParsedTransaction, id: string): string {
	if (transaction.kind === "transfer") {
		return [
			"Transfer saved!",
			`From: ${transaction.sourceAccount}`,
			`To: ${transaction.destinationAccount}`,
			`Amount: ${formatRupiah(transaction.amount)}`,
			`Note: ${transaction.note}`,
			`Transaction ID: ${id}`,
		].join("\n");
	}
	return [
		`${transaction.kind === "income" ? "Income" : "Expense"} saved!`,
		`Amount: ${formatRupiah(transaction.amount)}`,
		`Account: ${transaction.account}`,
		`Category: ${transaction.category}`,
		`Note: ${transaction.note}`,
		`Transaction ID: ${id}`,
	].join("\n");
}

export function formatAccounts(accounts: readonly AccountRecord[]): string {
	if (accounts.length === 0) {
		return "No accounts yet. Record a transaction to create one.";
	}
	return [
		"Account balances:",
		...accounts.map((account) => `${account.name} (${account.kind}): ${formatRupiah(account.balance)}`),
	].join("\n");
}
