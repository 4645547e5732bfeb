// src/validators/course.ts
import type { NewCourse } from "../repositories/types";
import { FieldReader } from "./fields";

export type CourseInput = Omit<NewCourse, "lecturer"> & { lecturer?: string };

export const parseCourseInput = (raw: unknown): CourseInput => {
  const f = new FieldReader(raw);
  const input: CourseInput = {
    code: f.reqString("code", 20).toUpperCase(),
    title: f.reqString("title", 200),
    description: f.optString("description") ?? "",
    lecturer: f.optString("lecturer"),
    credits: f.optNumber("credits", { min: 0 }) ?? 0,
    maxStudents: f.optNumber("maxStudents", { min: 1 }) ?? 50,
    startDate: f.reqDate("startDate"),
    endDate: f.reqDate("endDate"),
  };
  if (!f.errors.endDate && !f.errors.startDate && input.endDate < input.startDate) {
    f.fail("endDate", "End date must be after start date");
  }
  f.assertValid();
  return input;
};
