import { describe, it, expect } from "vitest";
import { getTableConfig } from "drizzle-orm/pg-core";
import {
  users,
  signupSchema,
  loginSchema,
  toPublicUser,
  toOwnUser,
  type User,
} from "../schema/auth";

const user: User = {
  id: 7,
  name: "alice",
  email: "alice@example.com",
  passwordHash: "$2a$04$placeholder",
  deleted: false,
  dateJoined: new Date("2026-02-01T10:00:00.000Z"),
  wins: 3,
  draws: 1,
  losses: 2,
};

describe("users table", () => {
  it("is named users with unique name and email columns", () => {
    const config = getTableConfig(users);
    expect(config.name).toBe("users");
    const unique = config.columns.filter((c) => c.isUnique).map((c) => c.name);
    expect(unique).toEqual(["name", "email"]);
  });

  it("leaves email and password hash nullable for soft-deleted users", () => {
    expect(users.email.notNull).toBe(false);
    expect(users.passwordHash.notNull).toBe(false);
    expect(users.name.notNull).toBe(true);
  });
});

describe("signupSchema", () => {
  it("accepts a valid signup", () => {
    const parsed = signupSchema.parse({
      name: "alice",
      email: "alice@example.com",
      password: "Fo0bar!!",
    });
    expect(parsed).toEqual({ name: "alice", email: "alice@example.com", password: "Fo0bar!!" });
  });

  it("requires a password", () => {
    expect(signupSchema.safeParse({ name: "alice", email: "alice@example.com" }).success).toBe(
      false
    );
  });

  it("applies the username rules", () => {
    expect(
      signupSchema.safeParse({ name: "a b", email: "alice@example.com", password: "Fo0bar!!" })
        .success
    ).toBe(false);
  });
});

describe("loginSchema", () => {
  it("requires both fields to be non-empty", () => {
    expect(loginSchema.safeParse({ name: "", password: "x" }).success).toBe(false);
    expect(loginSchema.safeParse({ name: "alice", password: "x" }).success).toBe(true);
  });
});

describe("user projections", () => {
  it("public projection omits email and password hash", () => {
    expect(toPublicUser(user)).toEqual({
      id: 7,
      name: "alice",
      deleted: false,
      dateJoined: new Date("2026-02-01T10:00:00.000Z"),
      wins: 3,
      draws: 1,
      losses: 2,
    });
  });

  it("owner projection adds email but never the hash", () => {
    const own = toOwnUser(user);
    expect(own.email).toBe("alice@example.com");
    expect("passwordHash" in own).toBe(false);
  });
});
