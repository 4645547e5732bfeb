// src/services/submissionWorkflow.ts
// Submission lifecycle:
//
//   draft ──submit──▶ submitted ──grade──▶ graded ──return──▶ returned
//                         ▲                                     │
//                         └───────────────submit────────────────┘
//
// Every transition is read → guard → conditional write on the row version,
// so two graders racing on one submission can't interleave their fields.
import type { Clock } from "../lib/clock";
import { hasCapability } from "../lib/capabilities";
import {
  AuthorizationError,
  ConflictError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "../lib/errors";
import type {
  AssignmentRepository,
  CourseRepository,
  SubmissionChanges,
  SubmissionRepository,
} from "../repositories/types";
import type { Actor, AssignmentRecord, SubmissionRecord, SubmissionStatus } from "../types/domain";
import { describeSubmission, type SubmissionView } from "../utils/gradingCore";
import type { GradeInput } from "../validators/submission";

export interface WorkflowDeps {
  submissions: SubmissionRepository;
  assignments: AssignmentRepository;
  courses: CourseRepository;
  clock: Clock;
}

export interface WorkflowOptions {
  /** Let graders mark a draft that was never submitted. */
  allowDraftGrading: boolean;
}

type TransitionName = "submit" | "grade" | "return";

const EDITABLE: readonly SubmissionStatus[] = ["draft", "submitted", "returned"];

interface Loaded {
  submission: SubmissionRecord;
  assignment: AssignmentRecord;
}

export class SubmissionWorkflow {
  private readonly sources: Record<TransitionName, readonly SubmissionStatus[]>;

  constructor(private readonly deps: WorkflowDeps, options: WorkflowOptions) {
    this.sources = {
      submit: ["draft", "returned"],
      grade: options.allowDraftGrading ? ["submitted", "draft"] : ["submitted"],
      return: ["graded"],
    };
  }

  async create(assignmentId: string, actor: Actor, content = ""): Promise<SubmissionView> {
    const assignment = await this.loadAssignment(assignmentId);

    if (!hasCapability(actor.role, "submit_work")) {
      throw new AuthorizationError("Only students can create submissions");
    }
    if (!(await this.deps.courses.isEnrolled(assignment.course, actor.id))) {
      throw new AuthorizationError("You are not enrolled in this course");
    }
    // Fast path for the common case; the unique index still settles races
    if (await this.deps.submissions.findByPair(assignment.id, actor.id)) {
      throw new ConflictError("A submission already exists for this assignment");
    }

    const created = await this.deps.submissions.insert({
      assignment: assignment.id,
      student: actor.id,
      content,
      status: "draft",
      pointsEarned: null,
      feedback: "",
      gradedBy: null,
      createdAt: this.deps.clock.now(),
      submittedAt: null,
      gradedAt: null,
    });
    return describeSubmission(created, assignment);
  }

  async editContent(submissionId: string, content: string, actor: Actor): Promise<SubmissionView> {
    const { submission, assignment } = await this.load(submissionId);
    this.assertOwner(submission, actor);
    if (!EDITABLE.includes(submission.status)) {
      throw new AuthorizationError("Graded submissions can no longer be edited");
    }
    return this.commit(submission, assignment, { content });
  }

  async submit(submissionId: string, actor: Actor): Promise<SubmissionView> {
    const { submission, assignment } = await this.load(submissionId);
    this.assertOwner(submission, actor);
    this.assertTransition(submission, "submit", "submitted");

    return this.commit(submission, assignment, {
      status: "submitted",
      // Stamped on the first submit only; a resubmission keeps the original time
      submittedAt: submission.submittedAt ?? this.deps.clock.now(),
    });
  }

  async grade(submissionId: string, input: GradeInput, actor: Actor): Promise<SubmissionView> {
    const { submission, assignment } = await this.load(submissionId);
    await this.assertGrader(assignment, actor);
    if (!Number.isFinite(input.pointsEarned) || input.pointsEarned < 0) {
      throw new ValidationError({ pointsEarned: "Points earned cannot be negative" });
    }
    this.assertTransition(submission, "grade", "graded");

    return this.commit(submission, assignment, {
      status: "graded",
      pointsEarned: input.pointsEarned,
      feedback: input.feedback,
      gradedBy: actor.id,
      gradedAt: this.deps.clock.now(),
    });
  }

  /** Sends graded work back to the student; the previous grade stays until regraded. */
  async returnForRevision(submissionId: string, feedback: string, actor: Actor): Promise<SubmissionView> {
    const { submission, assignment } = await this.load(submissionId);
    await this.assertGrader(assignment, actor);
    this.assertTransition(submission, "return", "returned");

    return this.commit(submission, assignment, {
      status: "returned",
      feedback: feedback || submission.feedback,
    });
  }

  async view(submissionId: string, actor: Actor): Promise<SubmissionView> {
    const { submission, assignment } = await this.load(submissionId);
    if (submission.student !== actor.id) await this.assertGrader(assignment, actor);
    return describeSubmission(submission, assignment);
  }

  async listForAssignment(assignmentId: string, actor: Actor): Promise<SubmissionView[]> {
    const assignment = await this.loadAssignment(assignmentId);
    await this.assertGrader(assignment, actor);
    const rows = await this.deps.submissions.listByAssignment(assignment.id);
    return rows.map((s) => describeSubmission(s, assignment));
  }

  private async loadAssignment(id: string): Promise<AssignmentRecord> {
    const assignment = await this.deps.assignments.findById(id);
    if (!assignment) throw new NotFoundError("Assignment");
    return assignment;
  }

  private async load(submissionId: string): Promise<Loaded> {
    const submission = await this.deps.submissions.findById(submissionId);
    if (!submission) throw new NotFoundError("Submission");
    const assignment = await this.loadAssignment(submission.assignment);
    return { submission, assignment };
  }

  private assertOwner(submission: SubmissionRecord, actor: Actor): void {
    if (submission.student !== actor.id) {
      throw new AuthorizationError("Only the student who owns this submission can change it");
    }
  }

  private async assertGrader(assignment: AssignmentRecord, actor: Actor): Promise<void> {
    if (!hasCapability(actor.role, "grade")) {
      throw new AuthorizationError("Only lecturers or admins can grade submissions");
    }
    if (actor.role !== "admin" && !(await this.deps.courses.isTeaching(assignment.course, actor.id))) {
      throw new AuthorizationError("You do not teach this course");
    }
  }

  private assertTransition(submission: SubmissionRecord, name: TransitionName, to: SubmissionStatus): void {
    if (!this.sources[name].includes(submission.status)) {
      throw new InvalidStateError(`Cannot ${name} a submission that is ${submission.status}`, {
        from: submission.status,
        to,
      });
    }
  }

  private async commit(
    submission: SubmissionRecord,
    assignment: AssignmentRecord,
    changes: SubmissionChanges
  ): Promise<SubmissionView> {
    const updated = await this.deps.submissions.updateIfVersion(submission.id, submission.version, changes);
    if (!updated) {
      throw new ConflictError("Submission was changed by another request; reload and try again");
    }
    return describeSubmission(updated, assignment);
  }
}
