// src/services/userService.ts
import bcrypt from "bcryptjs";
import { AuthenticationError, AuthorizationError, NotFoundError, ValidationError } from "../lib/errors";
import type { UserRepository } from "../repositories/types";
import type { Actor, UserRecord, UserWithPassword } from "../types/domain";
import type {
  AdminUserChanges,
  PasswordChange,
  ProfileChanges,
  RegistrationInput,
} from "../validators/user";

const strip = ({ password: _password, ...user }: UserWithPassword): UserRecord => user;

export class UserService {
  private dummyHash?: string;

  constructor(
    private readonly users: UserRepository,
    private readonly saltRounds: number
  ) {}

  async register(input: RegistrationInput): Promise<UserRecord> {
    const { password, ...profile } = input;
    const hash = await bcrypt.hash(password, this.saltRounds);
    return this.users.create({ ...profile, password: hash });
  }

  async authenticate(email: string, password: string): Promise<UserRecord> {
    const user = await this.users.findByEmailWithPassword(email);

    // Compare against something even when the user is unknown, so response
    // time doesn't reveal which emails exist.
    const hash = user?.password ?? (await this.getDummyHash());
    const valid = await bcrypt.compare(password, hash);

    if (!user || !valid) throw new AuthenticationError("Invalid credentials");
    if (user.status === "suspended") {
      throw new AuthorizationError("Account suspended. Contact administration.");
    }
    return strip(user);
  }

  async get(id: string): Promise<UserRecord> {
    const user = await this.users.findById(id);
    if (!user) throw new NotFoundError("User");
    return user;
  }

  list(): Promise<UserRecord[]> {
    return this.users.list();
  }

  async updateProfile(actor: Actor, changes: ProfileChanges): Promise<UserRecord> {
    const updated = await this.users.update(actor.id, {
      firstName: changes.firstName,
      lastName: changes.lastName,
      phoneNumber: changes.phoneNumber,
      bio: changes.bio,
    });
    if (!updated) throw new NotFoundError("User");
    return updated;
  }

  async adminUpdate(userId: string, changes: AdminUserChanges): Promise<UserRecord> {
    const updated = await this.users.update(userId, changes);
    if (!updated) throw new NotFoundError("User");
    return updated;
  }

  async changePassword(actor: Actor, change: PasswordChange): Promise<void> {
    const user = await this.users.findByIdWithPassword(actor.id);
    if (!user) throw new NotFoundError("User");
    if (!(await bcrypt.compare(change.oldPassword, user.password))) {
      throw new ValidationError({ oldPassword: "Incorrect password" });
    }
    await this.users.setPassword(user.id, await bcrypt.hash(change.newPassword, this.saltRounds));
  }

  private async getDummyHash(): Promise<string> {
    this.dummyHash ??= await bcrypt.hash("no-such-user", this.saltRounds);
    return this.dummyHash;
  }
}
