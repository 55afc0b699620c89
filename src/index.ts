import Config from "./config/config";
import TransactionHandler, { HELP_TEXT } from "./handlers/transaction.handler";
import { createParserConfig } from "./parser/parser.config";
import TransactionParser from "./parser/transaction.parser";
import ActualBudgetService from "./services/actual-budget.service";
import GeminiService from "./services/gemini.service";
import TelegramBot from "./services/telegram.bot";

class Main {
	private config: Config;
	private telegramBotService: TelegramBot;
	private actualBudgetService: ActualBudgetService;
	private transactionHandler: TransactionHandler;

	constructor(config: Config) {
		this.config = config;
		const parserConfig = createParserConfig({ promptPath: this.config.PROMPT_PATH });
		const aiService = this.config.GEMINI_API_KEY
			? new GeminiService({
					apiKey: this.config.GEMINI_API_KEY,
					model: this.config.GEMINI_MODEL,
					timeoutMs: this.config.GEMINI_TIMEOUT_MS,
				})
			: undefined;
		if (!aiService) {
			console.warn("GEMINI_API_KEY not set, using keyword parsing only");
		}

		this.actualBudgetService = new ActualBudgetService(this.config, parserConfig.tables);
		this.transactionHandler = new TransactionHandler(
			new TransactionParser(parserConfig, aiService),
			this.actualBudgetService,
			parserConfig,
		);
		this.telegramBotService = new TelegramBot(this.config.BOT_TOKEN);
	}

	async runner() {
		await this.actualBudgetService.init();
		const accounts = await this.actualBudgetService.getAccounts();
		console.log("Accounts:", accounts);

		const handler = this.transactionHandler;
		this.telegramBotService.commandStart(HELP_TEXT);
		this.telegramBotService.commandTransaction((text, user) => handler.handleCommand(text, user));
		this.telegramBotService.commandAccounts((text, user) => handler.handleAccounts(text, user));
		this.telegramBotService.onText((text, user) => handler.handleText(text, user));

		this.telegramBotService.launch(() => this.actualBudgetService.shutdown());
		console.log("Bot started");
	}
}

(async () => {
	const config = new Config();
	const missing = config.validate();
	if (missing.length > 0) {
		for (const key of missing) {
			console.error(`Missing required environment variable ${key}`);
		}
		process.exitCode = 1;
		return;
	}
	const main = new Main(config);
	await main.runner();
})().catch((error: unknown) => {
	console.error("Failed to start:", error);
	process.exitCode = 1;
});
