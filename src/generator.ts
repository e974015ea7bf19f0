import { query } from "@anthropic-ai/claude-agent-sdk";
import { withRetry, type RetryOptions } from "./retry.js";
import { GenerationUnavailableError, errorMessage } from "./errors.js";

/**
 * Produces a natural sentence that uses `term`, given the item's back
 * content as context. Rejects when no sentence can be produced.
 */
export interface SentenceGenerator {
  generateSentence(term: string, context: string): Promise<string>;
}

const CLOZE_SYSTEM_PROMPT =
  "You are an educational content creator specializing in fill-in-the-blank exercises. " +
  "You write a single, natural-sounding sentence that uses a given term in context and reinforces its meaning.";

export function buildClozePrompt(term: string, context: string): string {
  return `Create a fill-in-the-blank sentence for the term: ${term}
Using context from this definition: ${context}

Rules:
1. Create EXACTLY ONE sentence that naturally uses the term '${term}'
2. The sentence should be clear, educational, and contextually appropriate
3. Do NOT include any explanation, introduction, or additional text
4. Do NOT use bullet points or formatting
5. Do NOT use quotation marks around the sentence
6. Do NOT replace the term with blanks yourself
7. The sentence should be easy to understand for language learners
8. Respond with ONLY the single sentence`;
}

// Model output sometimes arrives quoted or on several lines; keep the first line
export function cleanGeneratedSentence(text: string): string {
  const firstLine = text.trim().split("\n")[0]?.trim() ?? "";
  return firstLine.replace(/^["'“”]+|["'“”]+$/g, "").trim();
}

export interface TextQueryOptions {
  model?: string;
  systemPrompt?: string;
  // Empty or missing: let the SDK locate the Claude executable
  claudeExecutablePath?: string;
}

export type TextQuery = (prompt: string, options: TextQueryOptions) => Promise<string>;

type ClaudeQueryOptions = NonNullable<Parameters<typeof query>[0]["options"]>;

// One turn, no tools; resolves with the final assistant text
export const queryClaudeText: TextQuery = async (prompt, options) => {
  const queryOptions: ClaudeQueryOptions = {
    maxTurns: 1,
    permissionMode: "bypassPermissions",
  };
  if (options.model) queryOptions.model = options.model;
  if (options.systemPrompt) queryOptions.systemPrompt = options.systemPrompt;
  if (options.claudeExecutablePath) queryOptions.pathToClaudeCodeExecutable = options.claudeExecutablePath;

  let text = "";
  for await (const message of query({ prompt, options: queryOptions })) {
    if (message.type === "assistant") {
      for (const block of message.message.content) {
        if (block.type === "text") text += block.text;
      }
    }
    if (message.type === "result" && message.subtype === "success" && message.result) {
      text = message.result;
    }
  }

  if (!text.trim()) {
    throw new Error("Claude returned an empty response");
  }
  return text;
};

export interface ClaudeSentenceGeneratorOptions {
  model?: string;
  claudeExecutablePath?: string;
  retry?: RetryOptions;
  query?: TextQuery;
}

export class ClaudeSentenceGenerator implements SentenceGenerator {
  private readonly query: TextQuery;

  constructor(private readonly options: ClaudeSentenceGeneratorOptions = {}) {
    this.query = options.query ?? queryClaudeText;
  }

  async generateSentence(term: string, context: string): Promise<string> {
    const startTime = Date.now();
    console.debug(`Generating cloze sentence for "${term}" (model: ${this.options.model ?? "default"})`);

    try {
      const text = await withRetry(
        () =>
          this.query(buildClozePrompt(term, context), {
            model: this.options.model,
            claudeExecutablePath: this.options.claudeExecutablePath,
            systemPrompt: CLOZE_SYSTEM_PROMPT,
          }),
        this.options.retry
      );

      const sentence = cleanGeneratedSentence(text);
      if (!sentence) {
        throw new Error("empty sentence");
      }
      console.debug(`Cloze sentence generated in ${Date.now() - startTime}ms`);
      return sentence;
    } catch (error) {
      console.error(`Sentence generation for "${term}" failed:`, error);
      throw new GenerationUnavailableError(`Sentence generation unavailable: ${errorMessage(error)}`, "generation_unavailable", {
        cause: error,
      });
    }
  }
}
