import * as dotenv from "dotenv";

dotenv.config({ path: "./.env" });

const REQUIRED = ["BOT_TOKEN", "ACTUAL_API_URL", "ACTUAL_API_TOKEN", "ACTUAL_BUDGET_ID"] as const;

class Config {
    readonly BOT_TOKEN: string;
    readonly GEMINI_API_KEY: string;
    readonly GEMINI_MODEL: string;
    readonly GEMINI_TIMEOUT_MS: number;
    readonly ACTUAL_API_URL: string;
    readonly ACTUAL_API_TOKEN: string;
    readonly ACTUAL_BUDGET_ID: string;
    readonly ACTUAL_DATA_DIR: string;
    readonly PROMPT_PATH: string | undefined;

    constructor(env: NodeJS.ProcessEnv = process.env) {
        this.BOT_TOKEN = env.BOT_TOKEN ?? "";
        this.GEMINI_API_KEY = env.GEMINI_API_KEY ?? "";
        this.GEMINI_MODEL = env.GEMINI_MODEL || "gemini-2.0-flash";
        this.GEMINI_TIMEOUT_MS = parsePositiveInt(env.GEMINI_TIMEOUT_MS, 15000);
        this.ACTUAL_API_URL = env.ACTUAL_API_URL ?? "";
        this.ACTUAL_API_TOKEN = env.ACTUAL_API_TOKEN ?? "";
        this.ACTUAL_BUDGET_ID = env.ACTUAL_BUDGET_ID ?? "";
        this.ACTUAL_DATA_DIR = env.ACTUAL_DATA_DIR || "./.cache";
        this.PROMPT_PATH = env.PROMPT_PATH || undefined;
    }

    /** Names of required variables that are unset. */
    validate(): string[] {
        return REQUIRED.filter((key) => this[key] === "");
    }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
    const parsed = Number.parseInt(value ?? "", 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export default Config;
