// src/tests/submissions.api.test.ts
import request from "supertest";
import { createApp } from "../app";
import { DAY, at, bearer, flushAudit, makeUser, seedWorld, type World } from "./support/fixtures";

describe("submission grading over HTTP", () => {
  let w: World;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    w = await seedWorld({ assignment: { dueDate: at(0) } });
    app = createApp({ repos: w.repos, clock: w.clock, settings: { bcryptRounds: 4 } });
  });

  const createSubmission = () =>
    request(app)
      .post("/submissions")
      .set("Authorization", bearer(w.student))
      .send({ assignment: w.assignment.id, content: "My complete solution" });

  it("walks a submission from draft to graded", async () => {
    const created = await createSubmission();
    expect(created.status).toBe(201);
    expect(created.body.submission).toMatchObject({ status: "draft", submittedAt: null });
    const id: string = created.body.submission.id;

    w.clock.set(at(DAY));
    const submitted = await request(app)
      .post(`/submissions/${id}/submit`)
      .set("Authorization", bearer(w.student));
    expect(submitted.status).toBe(200);
    expect(submitted.body.submission).toMatchObject({
      status: "submitted",
      submittedAt: at(DAY).toISOString(),
      isLate: true,
      daysLate: 1,
    });

    const graded = await request(app)
      .post(`/submissions/${id}/grade`)
      .set("Authorization", bearer(w.lecturer))
      .send({ pointsEarned: 55, feedback: "Close" });
    expect(graded.status).toBe(200);
    expect(graded.body.submission).toMatchObject({
      status: "graded",
      pointsEarned: 55,
      feedback: "Close",
      gradedBy: w.lecturer.id,
      isLate: true,
      daysLate: 1,
      percentageScore: 55,
      isPassing: false,
    });
  });

  it("answers 409 for a duplicate submission", async () => {
    await createSubmission();
    const second = await createSubmission();

    expect(second.status).toBe(409);
    expect(second.body).toEqual({
      success: false,
      message: "A submission already exists for this assignment",
    });
    expect(w.repos.submissions.rows.size).toBe(1);
  });

  it("answers 409 with the transition when resubmitting", async () => {
    const id: string = (await createSubmission()).body.submission.id;
    await request(app).post(`/submissions/${id}/submit`).set("Authorization", bearer(w.student));

    const again = await request(app).post(`/submissions/${id}/submit`).set("Authorization", bearer(w.student));

    expect(again.status).toBe(409);
    expect(again.body.details).toEqual({ from: "submitted", to: "submitted" });
  });

  it("answers 403 when a student tries to grade", async () => {
    const id: string = (await createSubmission()).body.submission.id;

    const res = await request(app)
      .post(`/submissions/${id}/grade`)
      .set("Authorization", bearer(w.student))
      .send({ pointsEarned: 100 });
    await flushAudit();

    expect(res.status).toBe(403);
    const denied = w.repos.auditLogs.rows.filter((r) => r.action === "access_denied");
    expect(denied).toHaveLength(1);
    expect(denied[0]).toMatchObject({ user: w.student.id, description: "student lacks grade", success: false });
  });

  it("answers 400 for negative points", async () => {
    const id: string = (await createSubmission()).body.submission.id;
    await request(app).post(`/submissions/${id}/submit`).set("Authorization", bearer(w.student));

    const res = await request(app)
      .post(`/submissions/${id}/grade`)
      .set("Authorization", bearer(w.lecturer))
      .send({ pointsEarned: -5 });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ pointsEarned: "Must be at least 0" });
  });

  it("logs domain events that point back at the submission", async () => {
    const id: string = (await createSubmission()).body.submission.id;
    await request(app).post(`/submissions/${id}/submit`).set("Authorization", bearer(w.student));
    await request(app)
      .post(`/submissions/${id}/grade`)
      .set("Authorization", bearer(w.lecturer))
      .send({ pointsEarned: 80 });
    await flushAudit();

    const grade = w.repos.auditLogs.rows.find((r) => r.action === "grade_submitted");
    expect(grade).toMatchObject({
      user: w.lecturer.id,
      targetType: "submission",
      targetId: id,
      extraData: { student: w.student.id, pointsEarned: 80, percentageScore: 80, isPassing: true },
    });
    expect(w.repos.auditLogs.rows.filter((r) => r.action === "submission")).toHaveLength(1);
    expect(w.repos.auditLogs.rows.filter((r) => r.action === "create")).toHaveLength(3);
  });

  it("returns graded work with feedback and rejects malformed feedback", async () => {
    const id: string = (await createSubmission()).body.submission.id;
    await request(app).post(`/submissions/${id}/submit`).set("Authorization", bearer(w.student));
    await request(app)
      .post(`/submissions/${id}/grade`)
      .set("Authorization", bearer(w.lecturer))
      .send({ pointsEarned: 40 });

    const bad = await request(app)
      .post(`/submissions/${id}/return`)
      .set("Authorization", bearer(w.lecturer))
      .send({ feedback: 123 });
    expect(bad.status).toBe(400);
    expect(bad.body.details).toEqual({ feedback: "Must be a string" });

    const returned = await request(app)
      .post(`/submissions/${id}/return`)
      .set("Authorization", bearer(w.lecturer))
      .send({ feedback: "Add references" });
    expect(returned.status).toBe(200);
    expect(returned.body.submission).toMatchObject({ status: "returned", feedback: "Add references", pointsEarned: 40 });
  });

  it("lets the lecturer list submissions for the assignment", async () => {
    await createSubmission();

    const res = await request(app)
      .get(`/assignments/${w.assignment.id}/submissions`)
      .set("Authorization", bearer(w.lecturer));

    expect(res.status).toBe(200);
    expect(res.body.data).toHaveLength(1);
    expect(res.body.data[0]).toMatchObject({ student: w.student.id, status: "draft" });
  });
});

describe("courses and assignments over HTTP", () => {
  let w: World;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    w = await seedWorld();
    app = createApp({ repos: w.repos, clock: w.clock, settings: { bcryptRounds: 4 } });
  });

  it("enrols a student and records the enrolment", async () => {
    const newcomer = await makeUser(w.repos, "student", "Nia");

    const res = await request(app)
      .post(`/courses/${w.course.id}/enroll`)
      .set("Authorization", bearer(newcomer));
    await flushAudit();

    expect(res.status).toBe(201);
    expect(res.body.enrollment).toMatchObject({ course: w.course.id, student: newcomer.id, status: "active" });
    expect(w.repos.auditLogs.rows.find((r) => r.action === "enrollment")).toMatchObject({
      targetType: "course",
      targetId: w.course.id,
    });
  });

  it("refuses to enrol someone twice", async () => {
    const res = await request(app)
      .post(`/courses/${w.course.id}/enroll`)
      .set("Authorization", bearer(w.student));

    expect(res.status).toBe(409);
  });

  it("creates an assignment with derived availability flags", async () => {
    const res = await request(app)
      .post("/assignments")
      .set("Authorization", bearer(w.lecturer))
      .send({
        course: w.course.id,
        title: "Quiz 1",
        assignmentType: "quiz",
        maxPoints: 20,
        passingPoints: 10,
        dueDate: at(-DAY).toISOString(),
        availableFrom: at(DAY).toISOString(),
      });

    expect(res.status).toBe(201);
    expect(res.body.assignment).toMatchObject({
      title: "Quiz 1",
      assignmentType: "quiz",
      createdBy: w.lecturer.id,
      isAvailable: false,
      isOverdue: true,
    });
  });

  it("reports every bad field at once", async () => {
    const res = await request(app)
      .post("/assignments")
      .set("Authorization", bearer(w.lecturer))
      .send({ course: w.course.id, assignmentType: "essay", maxPoints: "lots" });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({
      title: "This field is required",
      assignmentType: "Must be one of: homework, quiz, project, exam",
      maxPoints: "Must be a number",
      passingPoints: "This field is required",
      dueDate: "This field is required",
    });
  });

  it("validates an update against the merged record", async () => {
    const res = await request(app)
      .patch(`/assignments/${w.assignment.id}`)
      .set("Authorization", bearer(w.lecturer))
      .send({ maxPoints: 50 });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ passingPoints: "Passing points cannot exceed max points" });
  });

  it("keeps other lecturers out of the course", async () => {
    const res = await request(app)
      .patch(`/assignments/${w.assignment.id}`)
      .set("Authorization", bearer(w.otherLecturer))
      .send({ title: "Mine now" });

    expect(res.status).toBe(403);
    expect(res.body.message).toBe("You do not teach this course");
  });
});
