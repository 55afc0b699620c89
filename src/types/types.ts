export const TRANSACTION_KINDS = ["income", "expense", "transfer"] as const;
export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export const CATEGORIES = [
    "food",
    "transport",
    "shopping",
    "entertainment",
    "salary",
    "other",
] as const;
export type Category = (typeof CATEGORIES)[number];

export const ACCOUNT_KINDS = ["cash", "bank", "e-wallet", "credit-card"] as const;
export type AccountKind = (typeof ACCOUNT_KINDS)[number];

export const TRANSFER_SUBTYPES = ["withdrawal", "topup", "transfer"] as const;
export type TransferSubtype = (typeof TRANSFER_SUBTYPES)[number];

export type RegularTransaction = Readonly<{
    kind: "income" | "expense";
    amount: number;
    account: string;
    category: Category;
    note: string;
}>;

export type TransferTransaction = Readonly<{
    kind: "transfer";
    amount: number;
    sourceAccount: string;
    destinationAccount: string;
    category: "transfer";
    note: string;
}>;

export type ParsedTransaction = RegularTransaction | TransferTransaction;

/**
 * Loose record produced by either parser path before validation.
 * Field values may still be untrimmed, aliased or out of range.
 */
export type TransactionCandidate = {
    type: string;
    amount: number | string;
    account?: string;
    category?: string;
    sourceAccount?: string;
    destinationAccount?: string;
    note?: string;
};

export type AccountRecord = {
    name: string;
    kind: AccountKind;
    balance: number;
};

export type UserContext = {
    userId: number;
    username?: string;
};

export interface TextOracle {
    generate(prompt: string): Promise<string>;
}

export interface LedgerService {
    /** Records the transaction and returns its id. */
    commit(transaction: ParsedTransaction, user: UserContext): Promise<string>;
    getAccounts(): Promise<AccountRecord[]>;
}
