// src/tests/auth.test.ts
import request from "supertest";
import { createApp } from "../app";
import { bearer, flushAudit, seedWorld, type World } from "./support/fixtures";

const registration = {
  email: "New.Student@Example.test",
  password: "s3cure-pass",
  passwordConfirm: "s3cure-pass",
  firstName: "Nia",
  lastName: "Okafor",
};

describe("🔒 Authentication", () => {
  let w: World;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    w = await seedWorld();
    app = createApp({ repos: w.repos, clock: w.clock, settings: { bcryptRounds: 4 } });
  });

  it("registers a student and never echoes the password", async () => {
    const res = await request(app).post("/auth/register").send(registration);
    await flushAudit();

    expect(res.status).toBe(201);
    expect(res.body.user).toMatchObject({ email: "new.student@example.test", role: "student", status: "active" });
    expect(res.body.user).not.toHaveProperty("password");

    const row = w.repos.auditLogs.rows.find((r) => r.action === "create");
    expect(row).toMatchObject({ user: res.body.user.id, targetType: "user", targetId: res.body.user.id });
  });

  it("rejects mismatched passwords field by field", async () => {
    const res = await request(app)
      .post("/auth/register")
      .send({ ...registration, passwordConfirm: "other-pass" });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ passwordConfirm: "Passwords do not match" });
  });

  it("refuses to register an admin", async () => {
    const res = await request(app).post("/auth/register").send({ ...registration, role: "admin" });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ role: "Must be one of: student, lecturer" });
  });

  it("answers 409 for an email already in use", async () => {
    await request(app).post("/auth/register").send(registration);
    const res = await request(app).post("/auth/register").send(registration);

    expect(res.status).toBe(409);
    expect(res.body.message).toBe("A user with this email already exists");
  });

  it("logs in with the registered password and reaches /auth/me", async () => {
    await request(app).post("/auth/register").send(registration);

    const login = await request(app)
      .post("/auth/login")
      .send({ email: "new.student@example.test", password: "s3cure-pass" });
    expect(login.status).toBe(200);
    expect(login.get("Set-Cookie")?.[0]).toMatch(/^token=/);

    const me = await request(app).get("/auth/me").set("Authorization", `Bearer ${login.body.token}`);
    expect(me.status).toBe(200);
    expect(me.body.user.email).toBe("new.student@example.test");
  });

  it("records failed logins without an actor", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ email: "nobody@example.test", password: "wrong-pass" });
    await flushAudit();

    expect(res.status).toBe(401);
    expect(res.body.message).toBe("Invalid credentials");
    expect(w.repos.auditLogs.rows).toHaveLength(1);
    expect(w.repos.auditLogs.rows[0]).toMatchObject({
      user: null,
      action: "login",
      success: false,
      errorMessage: "Invalid credentials",
    });
  });

  it("strips NoSQL operators from the login body", async () => {
    const res = await request(app)
      .post("/auth/login")
      .send({ email: { $gt: "" }, password: "any-password" });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ email: "Must be a string" });
  });

  it("locks out repeated login attempts", async () => {
    for (let i = 0; i < 5; i++) {
      const res = await request(app)
        .post("/auth/login")
        .send({ email: `brute-${i}@example.test`, password: "wrong-pass" });
      expect(res.status).toBe(401);
    }

    const locked = await request(app)
      .post("/auth/login")
      .send({ email: "brute-5@example.test", password: "wrong-pass" });
    expect(locked.status).toBe(429);
    expect(locked.body.message).toContain("Too many attempts");
  });

  it("revokes the session of a user suspended mid-session", async () => {
    const token = bearer(w.student);
    await w.repos.users.update(w.student.id, { status: "suspended" });

    const res = await request(app).get("/auth/me").set("Authorization", token);

    expect(res.status).toBe(403);
    expect(res.body.message).toMatch(/revoked|suspended/i);
  });

  it("invalidates issued tokens when the password changes", async () => {
    await request(app).post("/auth/register").send(registration);
    const login = await request(app)
      .post("/auth/login")
      .send({ email: registration.email, password: registration.password });
    const token = `Bearer ${login.body.token}`;

    const changed = await request(app)
      .post("/auth/change-password")
      .set("Authorization", token)
      .send({ oldPassword: "s3cure-pass", newPassword: "even-better-1", newPasswordConfirm: "even-better-1" });
    expect(changed.status).toBe(200);

    const stale = await request(app).get("/auth/me").set("Authorization", token);
    expect(stale.status).toBe(401);
    expect(stale.body.message).toBe("Session expired due to security update.");
  });

  it("records logout", async () => {
    const res = await request(app).post("/auth/logout").set("Authorization", bearer(w.lecturer));
    await flushAudit();

    expect(res.status).toBe(200);
    expect(w.repos.auditLogs.rows.find((r) => r.action === "logout")).toMatchObject({
      user: w.lecturer.id,
      targetType: "user",
      targetId: w.lecturer.id,
    });
  });
});

describe("👤 User updates", () => {
  let w: World;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    w = await seedWorld();
    app = createApp({ repos: w.repos, clock: w.clock, settings: { bcryptRounds: 4 } });
  });

  it("ignores role and email on the profile route", async () => {
    const res = await request(app)
      .patch("/users/me")
      .set("Authorization", bearer(w.student))
      .send({ firstName: "Johnny", role: "admin", email: "taken-over@example.test" });

    expect(res.status).toBe(200);
    expect(res.body.user).toMatchObject({ firstName: "Johnny", role: "student", email: w.student.email });
  });

  it("lets an admin change a role", async () => {
    const res = await request(app)
      .patch(`/users/${w.student.id}`)
      .set("Authorization", bearer(w.admin))
      .send({ role: "lecturer" });

    expect(res.status).toBe(200);
    expect(res.body.user.role).toBe("lecturer");
  });

  it("keeps students off the admin route", async () => {
    const res = await request(app)
      .patch(`/users/${w.otherStudent.id}`)
      .set("Authorization", bearer(w.student))
      .send({ role: "admin" });

    expect(res.status).toBe(403);
    expect(w.repos.users.rows.get(w.otherStudent.id)?.role).toBe("student");
  });
});
