import { type Context, Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import type { UserContext } from "../types/types";

export type MessageHandler = (text: string, user: UserContext) => Promise<string>;

class TelegramBot {
    private bot: Telegraf<Context>;

    constructor(botToken: string) {
        this.bot = new Telegraf(botToken);
    }

    commandStart(reply: string) {
        this.bot.start((ctx) => ctx.reply(reply));
        this.bot.help((ctx) => ctx.reply(reply));
    }

    commandTransaction(handler: MessageHandler) {
        this.bot.command("input", (ctx) => this.respond(ctx, ctx.message.text, handler));
    }

    commandAccounts(handler: MessageHandler) {
        this.bot.command("accounts", (ctx) => this.respond(ctx, ctx.message.text, handler));
    }

    onText(handler: MessageHandler) {
        this.bot.on(message("text"), (ctx) => this.respond(ctx, ctx.message.text, handler));
    }

    launch(onStop: () => Promise<void>) {
        const stop = (signal: string) => {
            this.bot.stop(signal);
            onStop().catch((error: unknown) => console.error("Error during shutdown:", error));
        };
        process.once("SIGINT", () => stop("SIGINT"));
        process.once("SIGTERM", () => stop("SIGTERM"));
        this.bot.launch().catch((error: unknown) => {
            console.error("Telegram bot stopped:", error);
            process.exitCode = 1;
        });
    }

    private async respond(ctx: Context, text: string, handler: MessageHandler) {
        const from = ctx.from;
        if (!from) {
            return;
        }
        const user: UserContext = { userId: from.id, username: from.username };
        try {
            await ctx.reply(await handler(text, user));
        } catch (error) {
            console.error("Error handling message:", error);
            await ctx.reply("Something went wrong. Please try again.");
        }
    }
}

export default TelegramBot;
