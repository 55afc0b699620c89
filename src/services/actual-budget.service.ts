import { randomUUID } from "node:crypto";
import api from "@actual-app/api";
import dayjs from "dayjs";
import type Config from "../config/config";
import { InsufficientBalanceError, LedgerError } from "../parser/errors";
import { inferAccountKind } from "../parser/keyword.classifier";
import type { KeywordTables } from "../parser/keyword.tables";
import type {
    AccountRecord,
    Category,
    LedgerService,
    ParsedTransaction,
    RegularTransaction,
    TransferTransaction,
    UserContext,
} from "../types/types";

type ActualAccount = { id: string; name: string; closed?: boolean };
type ActualCategory = { id?: string; name: string };
type ActualPayee = { id: string; name: string; transfer_acct?: string | null };

// Actual stores amounts as integers in hundredths.
const toMinor = (amount: number) => Math.round(amount * 100);
const fromMinor = (amount: number) => amount / 100;

class ActualBudgetService implements LedgerService {
    private config: Config;
    private tables: KeywordTables;
    private apiInstance: typeof api;
    private apiInitialized = false;

    constructor(config: Config, tables: KeywordTables) {
        this.config = config;
        this.tables = tables;
        this.apiInstance = api;
    }

    async init(): Promise<void> {
        if (this.apiInitialized) {
            return;
        }
        await this.apiInstance.init({
            dataDir: this.config.ACTUAL_DATA_DIR,
            serverURL: this.config.ACTUAL_API_URL,
            password: this.config.ACTUAL_API_TOKEN,
        });

        await this.apiInstance.downloadBudget(this.config.ACTUAL_BUDGET_ID, {
            password: this.config.ACTUAL_API_TOKEN,
        });

        this.apiInitialized = true;
        console.log("API initialized successfully");
    }

    private async ensureInitialized(): Promise<void> {
        if (!this.apiInitialized) {
            await this.init();
        }
    }

    async shutdown(): Promise<void> {
        if (!this.apiInitialized) {
            return;
        }
        await this.apiInstance.shutdown();
        this.apiInitialized = false;
    }

    async getAccounts(): Promise<AccountRecord[]> {
        try {
            await this.ensureInitialized();
            const accounts = await this.openAccounts();
            const records: AccountRecord[] = [];
            for (const account of accounts) {
                records.push({
                    name: account.name,
                    kind: inferAccountKind(account.name, this.tables),
                    balance: fromMinor(await this.balanceOf(account)),
                });
            }
            return records;
        } catch (error) {
            console.error("Error getting accounts:", error);
            throw error;
        }
    }

    async commit(transaction: ParsedTransaction, user: UserContext): Promise<string> {
        await this.ensureInitialized();
        const id = randomUUID();
        try {
            if (transaction.kind === "transfer") {
                await this.addTransfer(id, transaction);
            } else {
                await this.addRegular(id, transaction);
            }
        } catch (error) {
            if (error instanceof InsufficientBalanceError || error instanceof LedgerError) {
                throw error;
            }
            console.error("Error adding transaction:", error);
            throw new LedgerError("Could not save the transaction to the budget.", { cause: error });
        }
        console.log(`Transaction ${id} saved for user ${user.userId}`);
        return id;
    }

    private async addRegular(id: string, transaction: RegularTransaction): Promise<void> {
        const account = await this.getOrCreateAccount(transaction.account);
        if (transaction.kind === "expense") {
            await this.assertSufficientBalance(account, transaction.amount);
        }
        const amount = toMinor(transaction.amount);

        await this.apiInstance.addTransactions(account.id, [
            {
                account: account.id,
                date: dayjs().format("YYYY-MM-DD"),
                amount: transaction.kind === "expense" ? -amount : amount,
                category: await this.findCategoryId(transaction.category),
                notes: transaction.note,
                imported_id: id,
            },
        ]);
    }

    private async addTransfer(id: string, transaction: TransferTransaction): Promise<void> {
        const source = await this.getOrCreateAccount(transaction.sourceAccount);
        const destination = await this.getOrCreateAccount(transaction.destinationAccount);
        await this.assertSufficientBalance(source, transaction.amount);

        const payees: ActualPayee[] = await this.apiInstance.getPayees();
        const transferPayee = payees.find((payee) => payee.transfer_acct === destination.id);
        if (!transferPayee) {
            throw new LedgerError(`No transfer payee for account ${destination.name}.`);
        }

        await this.apiInstance.addTransactions(
            source.id,
            [
                {
                    account: source.id,
                    date: dayjs().format("YYYY-MM-DD"),
                    amount: -toMinor(transaction.amount),
                    payee: transferPayee.id,
                    notes: transaction.note,
                    imported_id: id,
                },
            ],
            { runTransfers: true },
        );
    }

    private async openAccounts(): Promise<ActualAccount[]> {
        const accounts: ActualAccount[] = await this.apiInstance.getAccounts();
        return accounts.filter((account) => !account.closed);
    }

    /** Account names compare case-insensitively; unknown names are created empty. */
    private async getOrCreateAccount(name: string): Promise<ActualAccount> {
        const accounts = await this.openAccounts();
        const existing = accounts.find(
            (account) => account.name.toLowerCase() === name.toLowerCase(),
        );
        if (existing) {
            return existing;
        }
        const id: string = await this.apiInstance.createAccount({ name, offbudget: false }, 0);
        console.log(`Created account ${name}`);
        return { id, name };
    }

    /** Current balance in hundredths. */
    private async balanceOf(account: ActualAccount): Promise<number> {
        return this.apiInstance.getAccountBalance(account.id);
    }

    private async assertSufficientBalance(account: ActualAccount, amount: number): Promise<void> {
        if (inferAccountKind(account.name, this.tables) === "credit-card") {
            return;
        }
        const balance = await this.balanceOf(account);
        if (balance < toMinor(amount)) {
            throw new InsufficientBalanceError(account.name, amount, fromMinor(balance));
        }
    }

    private async findCategoryId(category: Category): Promise<string | undefined> {
        const categories: ActualCategory[] = await this.apiInstance.getCategories();
        return categories.find((entry) => entry.name.toLowerCase() === category)?.id;
    }
}

export default ActualBudgetService;
