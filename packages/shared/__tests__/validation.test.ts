import { describe, it, expect } from "vitest";
import { usernameSchema, passwordSchema, emailSchema } from "../schema/validation";

describe("usernameSchema", () => {
  it("accepts letters, digits, underscore and dash", () => {
    expect(usernameSchema.safeParse("fou_lu-99").success).toBe(true);
  });

  it("rejects names shorter than 3 characters", () => {
    const result = usernameSchema.safeParse("ab");
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe("Username must be at least 3 characters");
  });

  it("rejects names longer than 15 characters", () => {
    expect(usernameSchema.safeParse("a".repeat(16)).success).toBe(false);
  });

  it("rejects spaces and punctuation", () => {
    expect(usernameSchema.safeParse("bad name").success).toBe(false);
    expect(usernameSchema.safeParse("bad.name").success).toBe(false);
  });
});

describe("passwordSchema", () => {
  it("accepts a password with upper, lower, digit and special", () => {
    expect(passwordSchema.safeParse("Fo0bar!!").success).toBe(true);
  });

  it("reports a short password", () => {
    const result = passwordSchema.safeParse("Fo0!");
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe("Password is too short (<8 characters)");
  });

  it("reports a long password", () => {
    const result = passwordSchema.safeParse(`Aa1!${"x".repeat(61)}`);
    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe("Password is too long (>64 characters)");
  });

  it.each(["fo0bar!!", "FO0BAR!!", "Foobar!!", "Fo0barxx"])(
    "reports missing requirements for %s",
    (password) => {
      const result = passwordSchema.safeParse(password);
      expect(result.success).toBe(false);
      expect(result.error?.issues[0].message).toBe(
        "Password is missing requirements (at least 1 upper, 1 lower, 1 number and 1 special character)"
      );
    }
  );
});

describe("emailSchema", () => {
  it("trims and accepts a valid address", () => {
    expect(emailSchema.parse("  alice@example.com ")).toBe("alice@example.com");
  });

  it("rejects a malformed address", () => {
    expect(emailSchema.safeParse("alice@").success).toBe(false);
  });
});
