import { type KeywordTables, loadKeywordTables } from "./keyword.tables";
import { loadPromptTemplate } from "./prompt";

export type ParserConfig = Readonly<{
	tables: KeywordTables;
	promptTemplate: string;
	/** Leading bot command stripped from the input. */
	commandPrefix: RegExp;
}>;

export const INPUT_COMMAND_PREFIX = /^\/input(?:@\w+)?(?:\s+|$)/i;

/** Built once at start-up and shared read-only by every parse call. */
export function createParserConfig(options: { promptPath?: string } = {}): ParserConfig {
	return Object.freeze({
		tables: loadKeywordTables(),
		promptTemplate: loadPromptTemplate(options.promptPath),
		commandPrefix: INPUT_COMMAND_PREFIX,
	});
}
