import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export const USER_INPUT_PLACEHOLDER = "{user_input}";

export const DEFAULT_PROMPT_PATH = fileURLToPath(
	new URL("../config/transaction-prompt.txt", import.meta.url),
);

export const FALLBACK_PROMPT = `Analyze this transaction: "{user_input}"

If it is a TRANSFER between accounts (transfer, tarik tunai, topup, dari X ke Y), return:
{"type": "transfer", "amount": number, "source_account": "account", "destination_account": "account", "note": "description"}

Otherwise return:
{"type": "income|expense", "amount": number, "account": "account", "category": "food|transport|shopping|entertainment|salary|other", "note": "description"}

Rules: k=1000, rb=1000, jt=1000000. Default account="cash", type="expense".

Examples:
"bakso 15k" -> {"type": "expense", "amount": 15000, "account": "cash", "category": "food", "note": "bakso"}
"Tarik tunai BRI 1jt" -> {"type": "transfer", "amount": 1000000, "source_account": "bri", "destination_account": "cash", "note": "Tarik tunai BRI"}
"Topup gopay 30k" -> {"type": "transfer", "amount": 30000, "source_account": "cash", "destination_account": "gopay", "note": "Topup gopay"}

Return only the JSON object.
`;

export function loadPromptTemplate(path: string = DEFAULT_PROMPT_PATH): string {
	try {
		const template = readFileSync(path, "utf8");
		if (!template.includes(USER_INPUT_PLACEHOLDER)) {
			console.warn(`Prompt template ${path} has no ${USER_INPUT_PLACEHOLDER}, using fallback prompt`);
			return FALLBACK_PROMPT;
		}
		return template;
	} catch (error) {
		console.warn(`Prompt template ${path} not readable, using fallback prompt:`, error);
		return FALLBACK_PROMPT;
	}
}

export function renderPrompt(template: string, input: string): string {
	return template.replaceAll(USER_INPUT_PLACEHOLDER, () => input);
}
