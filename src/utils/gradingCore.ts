// src/utils/gradingCore.ts
// Pure grading rules. Everything here is derived on read and never stored,
// so changing a due date or max points can't leave stale flags behind.
import { MS_PER_DAY } from "../lib/clock";
import type { FieldErrors } from "../lib/errors";
import type { AssignmentRecord, SubmissionRecord } from "../types/domain";

type AssignmentRules = Pick<
  AssignmentRecord,
  | "title"
  | "maxPoints"
  | "passingPoints"
  | "dueDate"
  | "availableFrom"
  | "availableUntil"
  | "latePenaltyPerDay"
>;

type ScoringAssignment = Pick<
  AssignmentRecord,
  "maxPoints" | "passingPoints" | "dueDate" | "allowLateSubmission" | "latePenaltyPerDay"
>;

type Scored = Pick<SubmissionRecord, "pointsEarned" | "submittedAt">;

export const validateAssignmentRules = (a: AssignmentRules): FieldErrors => {
  const errors: FieldErrors = {};

  if (!a.title.trim()) errors.title = "Title is required";
  if (!(a.maxPoints > 0)) errors.maxPoints = "Max points must be greater than 0";
  if (a.passingPoints < 0) {
    errors.passingPoints = "Passing points cannot be negative";
  } else if (a.passingPoints > a.maxPoints) {
    errors.passingPoints = "Passing points cannot exceed max points";
  }
  if (Number.isNaN(a.dueDate.getTime())) errors.dueDate = "Due date is invalid";
  if (a.availableFrom && a.availableUntil && a.availableFrom > a.availableUntil) {
    errors.availableUntil = "Availability window ends before it starts";
  }
  if (a.latePenaltyPerDay < 0 || a.latePenaltyPerDay > 100) {
    errors.latePenaltyPerDay = "Late penalty must be between 0 and 100 percent";
  }

  return errors;
};

// Missing bounds are open: no availableFrom means "since forever".
export const isAvailable = (
  a: Pick<AssignmentRecord, "availableFrom" | "availableUntil">,
  now: Date
): boolean => {
  if (a.availableFrom && now < a.availableFrom) return false;
  if (a.availableUntil && now > a.availableUntil) return false;
  return true;
};

export const isOverdue = (a: Pick<AssignmentRecord, "dueDate">, now: Date): boolean =>
  now > a.dueDate;

export const isLate = (s: Pick<SubmissionRecord, "submittedAt">, a: Pick<AssignmentRecord, "dueDate">): boolean =>
  s.submittedAt !== null && s.submittedAt > a.dueDate;

/** Whole days past the due date, truncated. 0 when on time or unsubmitted. */
export const daysLate = (s: Pick<SubmissionRecord, "submittedAt">, a: Pick<AssignmentRecord, "dueDate">): number => {
  if (!s.submittedAt || !isLate(s, a)) return 0;
  return Math.floor((s.submittedAt.getTime() - a.dueDate.getTime()) / MS_PER_DAY);
};

export const percentageScore = (s: Scored, a: Pick<AssignmentRecord, "maxPoints">): number | null =>
  s.pointsEarned === null ? null : (s.pointsEarned * 100) / a.maxPoints;

// Inclusive: scoring exactly the passing points passes
export const isPassing = (s: Scored, a: Pick<AssignmentRecord, "passingPoints">): boolean | null =>
  s.pointsEarned === null ? null : s.pointsEarned >= a.passingPoints;

/**
 * Raw points minus the late penalty, floored at zero.
 *
 * The penalty is `latePenaltyPerDay` percent of `maxPoints` per whole day
 * late and only applies when the assignment accepts late work. The raw score
 * stays the one `percentageScore` and `isPassing` read; this figure is
 * advisory and reported next to it.
 */
export const effectiveScore = (s: Scored, a: ScoringAssignment): number | null => {
  if (s.pointsEarned === null) return null;
  if (!a.allowLateSubmission || !isLate(s, a)) return s.pointsEarned;

  const penalty = (daysLate(s, a) * a.latePenaltyPerDay * a.maxPoints) / 100;
  return s.pointsEarned - Math.min(s.pointsEarned, penalty);
};

export interface SubmissionView extends SubmissionRecord {
  isLate: boolean;
  daysLate: number;
  percentageScore: number | null;
  isPassing: boolean | null;
  effectiveScore: number | null;
}

export const describeSubmission = (s: SubmissionRecord, a: ScoringAssignment): SubmissionView => ({
  ...s,
  isLate: isLate(s, a),
  daysLate: daysLate(s, a),
  percentageScore: percentageScore(s, a),
  isPassing: isPassing(s, a),
  effectiveScore: effectiveScore(s, a),
});

export interface AssignmentView extends AssignmentRecord {
  isAvailable: boolean;
  isOverdue: boolean;
}

export const describeAssignment = (a: AssignmentRecord, now: Date): AssignmentView => ({
  ...a,
  isAvailable: isAvailable(a, now),
  isOverdue: isOverdue(a, now),
});
