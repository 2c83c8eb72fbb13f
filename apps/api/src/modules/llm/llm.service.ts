import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { GoogleGenerativeAI } from "@google/generative-ai";

export interface StructuredGenerationOptions {
  temperature: number;
  timeoutMs: number;
}

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>("GEMINI_API_KEY");
    if (!apiKey) {
      throw new Error("GEMINI_API_KEY is required");
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = this.configService.get<string>("GEMINI_MODEL") ?? "gemini-2.0-flash-lite";
  }

  /**
   * Generate a JSON reply. Errors and empty replies are thrown to the caller,
   * which decides on the fallback.
   */
  async generateJson(prompt: string, options: StructuredGenerationOptions): Promise<string> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.modelName,
        generationConfig: {
          temperature: options.temperature,
          responseMimeType: "application/json",
        },
      },
      { timeout: options.timeoutMs }
    );

    const result = await model.generateContent(prompt);
    const text = result.response.text();

    if (!text || text.trim().length === 0) {
      this.logger.warn(`Empty response from ${this.modelName}`);
      throw new Error("Empty response from language model");
    }

    return text;
  }
}
