// src/validators/assignment.ts
import { ASSIGNMENT_TYPES, type AssignmentType } from "../types/domain";
import type { AssignmentChanges } from "../repositories/types";
import { FieldReader } from "./fields";

export interface AssignmentInput {
  course: string;
  title: string;
  description: string;
  assignmentType: AssignmentType;
  maxPoints: number;
  passingPoints: number;
  dueDate: Date;
  availableFrom: Date | null;
  availableUntil: Date | null;
  allowLateSubmission: boolean;
  latePenaltyPerDay: number;
}

export const parseAssignmentInput = (raw: unknown): AssignmentInput => {
  const f = new FieldReader(raw);
  const input: AssignmentInput = {
    course: f.reqString("course"),
    title: f.reqString("title", 200),
    description: f.optString("description") ?? "",
    assignmentType: f.optOneOf("assignmentType", ASSIGNMENT_TYPES) ?? "homework",
    maxPoints: f.reqNumber("maxPoints"),
    passingPoints: f.reqNumber("passingPoints"),
    dueDate: f.reqDate("dueDate"),
    availableFrom: f.optDate("availableFrom") ?? null,
    availableUntil: f.optDate("availableUntil") ?? null,
    allowLateSubmission: f.optBoolean("allowLateSubmission") ?? false,
    latePenaltyPerDay: f.optNumber("latePenaltyPerDay") ?? 0,
  };
  f.assertValid();
  return input;
};

export const parseAssignmentChanges = (raw: unknown): AssignmentChanges => {
  const f = new FieldReader(raw);
  const changes: AssignmentChanges = {
    title: f.optString("title", 200),
    description: f.optString("description"),
    assignmentType: f.optOneOf("assignmentType", ASSIGNMENT_TYPES),
    maxPoints: f.optNumber("maxPoints"),
    passingPoints: f.optNumber("passingPoints"),
    dueDate: f.optDate("dueDate") ?? undefined,
    availableFrom: f.optDate("availableFrom"),
    availableUntil: f.optDate("availableUntil"),
    allowLateSubmission: f.optBoolean("allowLateSubmission"),
    latePenaltyPerDay: f.optNumber("latePenaltyPerDay"),
  };
  f.assertValid();
  return changes;
};
