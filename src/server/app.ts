import express from "express";
import { z } from "zod";
import type { AnswerGenerator } from "../answers/bedrock.js";
import type { Pipeline } from "../collector/pipeline.js";
import { GenerationError, errorMessage, type GenerationErrorKind } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import type { FetchOutcome } from "../shared/record.js";
import type { LetterStore } from "../store/letters.js";
import type { QuestionStore } from "../store/questions.js";

export type AppDeps = {
  pipeline: Pick<Pipeline, "fetchNew" | "fetchMore">;
  letters: LetterStore;
  questions: QuestionStore;
  answers: AnswerGenerator;
  logger?: Logger;
};

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0)
});

const IdParam = z.coerce.number().int().positive();

const QuestionBody = z.object({
  question: z.string().trim().min(1).max(5000)
});

const GENERATION_STATUS: Record<GenerationErrorKind, number> = {
  rate_limit: 429,
  auth: 502,
  invalid_response: 502,
  unavailable: 503,
  timeout: 504
};

const firstIssue = (error: z.ZodError) => {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
};

const outcomeStatus = (outcome: FetchOutcome) => (outcome.status === "failed" ? 502 : 200);

export const createApp = (deps: AppDeps) => {
  const logger = (deps.logger ?? silentLogger).child({ component: "http" });
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.debug("HTTP response", {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        elapsedMs: Date.now() - startedAt
      });
    });
    next();
  });

  const serverError = (res: express.Response, context: string, error: unknown) => {
    const message = errorMessage(error);
    logger.error(context, { error: message });
    res.status(500).json({ error: message });
  };

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/api/letters", async (req, res) => {
    const query = ListQuery.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: firstIssue(query.error) });
    }
    const { limit, offset } = query.data;
    try {
      const { records, total } = await deps.letters.listPaginated(limit, offset);
      return res.json({
        letters: records,
        total,
        has_more: offset + records.length < total
      });
    } catch (error) {
      return serverError(res, "Failed to list letters", error);
    }
  });

  app.post("/api/letters/fetch-new", async (_req, res) => {
    try {
      const outcome = await deps.pipeline.fetchNew();
      return res.status(outcomeStatus(outcome)).json(outcome);
    } catch (error) {
      return serverError(res, "Fetching new letters failed", error);
    }
  });

  app.post("/api/letters/fetch-more", async (_req, res) => {
    try {
      const outcome = await deps.pipeline.fetchMore();
      return res.status(outcomeStatus(outcome)).json(outcome);
    } catch (error) {
      return serverError(res, "Fetching older letters failed", error);
    }
  });

  app.get("/api/letters/:id", async (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json({ error: "Invalid letter id" });
    }
    try {
      const letter = await deps.letters.getById(id.data);
      if (!letter) {
        return res.status(404).json({ error: "Letter not found" });
      }
      const questions = await deps.questions.listForLetter(id.data);
      return res.json({ letter, questions });
    } catch (error) {
      return serverError(res, "Failed to load letter", error);
    }
  });

  app.post("/api/letters/:id/questions", async (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json({ error: "Invalid letter id" });
    }
    const body = QuestionBody.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: firstIssue(body.error) });
    }
    try {
      const letter = await deps.letters.getById(id.data);
      if (!letter) {
        return res.status(404).json({ error: "Letter not found" });
      }
      const answer = await deps.answers.answer(letter.content, body.data.question);
      const stored = await deps.questions.insert(id.data, body.data.question, answer);
      return res.json({ question_id: stored.id, answer: stored.answer, timestamp: stored.created_at });
    } catch (error) {
      if (error instanceof GenerationError) {
        return res.status(GENERATION_STATUS[error.kind]).json({ error: error.message, kind: error.kind });
      }
      return serverError(res, "Failed to answer question", error);
    }
  });

  app.delete("/api/questions/:id", async (req, res) => {
    const id = IdParam.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json({ error: "Invalid question id" });
    }
    try {
      const deleted = await deps.questions.delete(id.data);
      if (!deleted) {
        return res.status(404).json({ error: "Question not found" });
      }
      return res.json({ success: true, message: "Question deleted" });
    } catch (error) {
      return serverError(res, "Failed to delete question", error);
    }
  });

  return app;
};
