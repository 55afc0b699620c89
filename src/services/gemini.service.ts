import {
	type GenerationConfig,
	type GenerativeModel,
	GoogleGenerativeAI,
} from "@google/generative-ai";
import type { TextOracle } from "../types/types";

type GeminiOptions = {
	apiKey: string;
	model: string;
	timeoutMs: number;
};

/**
 * Gemini text completion. Errors and timeouts propagate to the caller,
 * which owns the fallback.
 */
class GeminiService implements TextOracle {
	private genAI: GoogleGenerativeAI;
	private model: GenerativeModel;

	constructor({ apiKey, model, timeoutMs }: GeminiOptions) {
		this.genAI = new GoogleGenerativeAI(apiKey);
		this.model = this.genAI.getGenerativeModel(
			{ model, generationConfig: this.getGenerationConfig() },
			{ timeout: timeoutMs },
		);
	}

	async generate(prompt: string): Promise<string> {
		const result = await this.model.generateContent(prompt);
		const text = result.response.text();
		console.log("Gemini raw response:", text);
		return text;
	}

	private getGenerationConfig(): GenerationConfig {
		return {
			temperature: 0.2,
			topP: 0.95,
			topK: 40,
			maxOutputTokens: 1024,
			responseMimeType: "application/json",
		};
	}
}

export default GeminiService;
