import type pg from "pg";
import type { QuestionRecord } from "../shared/record.js";

export interface QuestionStore {
  listForLetter: (letterId: number) => Promise<QuestionRecord[]>;
  insert: (letterId: number, question: string, answer: string) => Promise<QuestionRecord>;
  delete: (questionId: number) => Promise<boolean>;
}

type QuestionRow = Omit<QuestionRecord, "created_at"> & { created_at: Date | string };

const toQuestionRecord = (row: QuestionRow): QuestionRecord => ({
  id: Number(row.id),
  letter_id: Number(row.letter_id),
  question: row.question,
  answer: row.answer,
  created_at: row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at
});

export const createPgQuestionStore = (db: pg.Pool): QuestionStore => {
  const listForLetter = async (letterId: number): Promise<QuestionRecord[]> => {
    const result = await db.query<QuestionRow>(
      `
      SELECT id, letter_id, question, answer, created_at
      FROM questions
      WHERE letter_id = $1
      ORDER BY created_at ASC, id ASC
    `,
      [letterId]
    );
    return result.rows.map(toQuestionRecord);
  };

  const insert = async (letterId: number, question: string, answer: string): Promise<QuestionRecord> => {
    const result = await db.query<QuestionRow>(
      `
      INSERT INTO questions (letter_id, question, answer)
      VALUES ($1, $2, $3)
      RETURNING id, letter_id, question, answer, created_at
    `,
      [letterId, question, answer]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Question insert for letter ${letterId} returned no row`);
    }
    return toQuestionRecord(row);
  };

  const remove = async (questionId: number): Promise<boolean> => {
    const result = await db.query("DELETE FROM questions WHERE id = $1", [questionId]);
    return (result.rowCount ?? 0) > 0;
  };

  return { listForLetter, insert, delete: remove };
};
