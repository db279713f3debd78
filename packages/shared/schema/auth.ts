import { z } from "zod";
import { pgTable, serial, integer, boolean, timestamp, varchar, text } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { usernameSchema, emailSchema, passwordSchema } from "./validation";

// Soft-deleted users keep their name so past invitations and games still resolve;
// email and password hash are cleared.
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 15 }).notNull().unique(),
  email: varchar("email", { length: 255 }).unique(),
  passwordHash: text("password_hash"),
  deleted: boolean("deleted").notNull().default(false),
  dateJoined: timestamp("date_joined").defaultNow().notNull(),
  wins: integer("wins").notNull().default(0),
  draws: integer("draws").notNull().default(0),
  losses: integer("losses").notNull().default(0),
});

export const insertUserSchema = createInsertSchema(users).pick({
  name: true,
  email: true,
});

export const signupSchema = insertUserSchema.extend({
  name: usernameSchema,
  email: emailSchema,
  password: passwordSchema,
});

export const loginSchema = z.object({
  name: z.string().min(1, "Name is required"),
  password: z.string().min(1, "Password is required"),
});

export type User = typeof users.$inferSelect;

/** Fields any authenticated user may see about another user. */
export type PublicUser = Pick<User, "id" | "name" | "deleted" | "dateJoined" | "wins" | "draws" | "losses">;

/** Fields a user may see about themselves. */
export type OwnUser = PublicUser & Pick<User, "email">;

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    name: user.name,
    deleted: user.deleted,
    dateJoined: user.dateJoined,
    wins: user.wins,
    draws: user.draws,
    losses: user.losses,
  };
}

export function toOwnUser(user: User): OwnUser {
  return { ...toPublicUser(user), email: user.email };
}
