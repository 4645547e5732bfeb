// src/validators/submission.ts
import { FieldReader } from "./fields";

export const MAX_CONTENT_LENGTH = 100_000;

export const parseNewSubmission = (raw: unknown): { assignment: string; content: string } => {
  const f = new FieldReader(raw);
  const input = {
    assignment: f.reqString("assignment"),
    content: f.optString("content", MAX_CONTENT_LENGTH) ?? "",
  };
  f.assertValid();
  return input;
};

export const parseContent = (raw: unknown): string => {
  const f = new FieldReader(raw);
  if (!f.has("content")) f.fail("content", "This field is required");
  const content = f.optString("content", MAX_CONTENT_LENGTH) ?? "";
  f.assertValid();
  return content;
};

export interface GradeInput {
  pointsEarned: number;
  feedback: string;
}

// No upper bound: extra credit above maxPoints is recorded as given
export const parseGradeInput = (raw: unknown): GradeInput => {
  const f = new FieldReader(raw);
  const input: GradeInput = {
    pointsEarned: f.reqNumber("pointsEarned", { min: 0 }),
    feedback: f.optString("feedback") ?? "",
  };
  f.assertValid();
  return input;
};

export const parseFeedback = (raw: unknown): string => {
  const f = new FieldReader(raw);
  const feedback = f.optString("feedback") ?? "";
  f.assertValid();
  return feedback;
};
