import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { fromIni } from "@aws-sdk/credential-providers";
import { z } from "zod";
import type { AppConfig } from "../shared/config.js";
import { GenerationError, errorMessage, type GenerationErrorKind } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";

export interface AnswerGenerator {
  answer: (content: string, question: string) => Promise<string>;
}

const ResponseSchema = z.object({
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional()
      })
    )
    .min(1)
});

const ERROR_KINDS: Record<string, GenerationErrorKind> = {
  ThrottlingException: "rate_limit",
  TooManyRequestsException: "rate_limit",
  ServiceQuotaExceededException: "rate_limit",
  AccessDeniedException: "auth",
  UnrecognizedClientException: "auth",
  ExpiredTokenException: "auth",
  InvalidSignatureException: "auth",
  CredentialsProviderError: "auth",
  ModelTimeoutException: "timeout",
  TimeoutError: "timeout",
  RequestTimeout: "timeout",
  AbortError: "timeout",
  ValidationException: "invalid_response",
  ModelErrorException: "invalid_response",
  ServiceUnavailableException: "unavailable",
  InternalServerException: "unavailable",
  ModelNotReadyException: "unavailable"
};

export const classifyGenerationError = (error: unknown): GenerationError => {
  if (error instanceof GenerationError) return error;
  const name = error instanceof Error ? error.name : "";
  const kind = ERROR_KINDS[name] ?? "unavailable";
  return new GenerationError(kind, `Answer generation failed (${name || "unknown"}): ${errorMessage(error)}`, error);
};

export const buildPrompt = (content: string, question: string): string =>
  [
    "You are an economist answering questions about a published economic letter.",
    "",
    "<letter>",
    content,
    "</letter>",
    "",
    "<question>",
    question,
    "</question>",
    "",
    "Answer clearly and concisely from the letter. If the letter does not hold enough information to answer fully, say so and give what insight it does support."
  ].join("\n");

export const parseAnswer = (raw: string): string => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new GenerationError("invalid_response", "Model response is not JSON", error);
  }
  const parsed = ResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new GenerationError("invalid_response", `Unexpected model response: ${parsed.error.issues[0]?.message}`);
  }
  const text = parsed.data.content
    .filter((block) => block.type === "text")
    .map((block) => block.text ?? "")
    .join("")
    .trim();
  if (!text) {
    throw new GenerationError("invalid_response", "Model returned an empty answer");
  }
  return text;
};

export type BedrockGeneratorOptions = AppConfig["answers"] & {
  timeoutMs: number;
  maxAttempts: number;
  logger?: Logger;
};

export const createBedrockAnswerGenerator = (options: BedrockGeneratorOptions): AnswerGenerator => {
  const logger = (options.logger ?? silentLogger).child({ component: "answers" });
  const client = new BedrockRuntimeClient({
    region: options.region,
    maxAttempts: options.maxAttempts,
    credentials: options.profile ? fromIni({ profile: options.profile }) : undefined,
    requestHandler: { requestTimeout: options.timeoutMs }
  });

  const answer = async (content: string, question: string): Promise<string> => {
    const body = {
      anthropic_version: "bedrock-2023-05-31",
      max_tokens: options.maxTokens,
      temperature: 0.7,
      messages: [{ role: "user", content: buildPrompt(content, question) }]
    };

    const startedAt = Date.now();
    logger.info("Invoking model", { modelId: options.modelId });
    try {
      const response = await client.send(
        new InvokeModelCommand({
          modelId: options.modelId,
          contentType: "application/json",
          accept: "application/json",
          body: JSON.stringify(body)
        })
      );
      const text = parseAnswer(new TextDecoder().decode(response.body));
      logger.info("Model answered", { modelId: options.modelId, elapsedMs: Date.now() - startedAt });
      return text;
    } catch (error) {
      const failure = classifyGenerationError(error);
      logger.error("Answer generation failed", {
        modelId: options.modelId,
        kind: failure.kind,
        error: failure.message
      });
      throw failure;
    }
  };

  return { answer };
};
