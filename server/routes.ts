import type { Express } from "express";
import { createAuthenticateUser } from "./auth/middleware";
import { createLoginLimiter, createSignupLimiter } from "./middleware/rateLimit";
import { createAuthRouter } from "./routes/auth";
import { createUsersRouter } from "./routes/users";
import { createInvitationsRouter } from "./routes/invitations";
import { createGamesRouter } from "./routes/games";
import { createMovesRouter } from "./routes/moves";
import { sendUnexpected } from "./routes/shared";
import type { AppServices } from "./services";

export function registerRoutes(app: Express, services: AppServices): void {
  const authenticate = createAuthenticateUser(services.auth, services.storage);

  // 1. Liveness + store reachability (public)
  app.get("/health", async (req, res) => {
    try {
      const database = (await services.storage.ping()) ? "up" : "down";
      res.json({ status: database === "up" ? "ok" : "degraded", database });
    } catch (error) {
      sendUnexpected(req, res, error, "Health check failed");
    }
  });

  // 2. Login / signup (public, rate limited)
  app.use(
    createAuthRouter({
      users: services.users,
      loginLimiter: createLoginLimiter(),
      signupLimiter: createSignupLimiter(),
    })
  );

  // 3. Bearer-token endpoints
  app.use("/users", createUsersRouter({ users: services.users, authenticate }));
  app.use(
    "/invitations",
    createInvitationsRouter({ invitations: services.invitations, authenticate })
  );
  app.use("/games", createGamesRouter({ games: services.games, authenticate }));
  app.use("/moves", createMovesRouter({ games: services.games, authenticate }));
}
