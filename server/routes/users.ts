import { Router, type RequestHandler } from "express";
import { toOwnUser, toPublicUser } from "@shared/schema";
import type { UserService } from "../services/userService";
import { parseInput } from "../middleware/validation";
import { Errors } from "../utils/apiError";
import { sendUnexpected, userListQuerySchema } from "./shared";

export interface UsersRouterDeps {
  users: UserService;
  authenticate: RequestHandler;
}

export function createUsersRouter({ users, authenticate }: UsersRouterDeps): Router {
  const router = Router();

  // GET /users: filtered, paginated public listing
  router.get("/", authenticate, async (req, res) => {
    const query = parseInput(userListQuerySchema, req.query, res);
    if (!query) return;

    try {
      const found = await users.list(query);
      res.json(found.map(toPublicUser));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to list users");
    }
  });

  // GET /users/self: the caller's own record
  router.get("/self", authenticate, (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    res.json(toOwnUser(user));
  });

  // DELETE /users/self: soft-delete the caller
  router.delete("/self", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);

    try {
      const deleted = await users.softDelete(user.id);
      if (!deleted) {
        return Errors.unauthorized(res, "USER_DELETED", "user has been deleted");
      }
      res.status(204).end();
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to delete user");
    }
  });

  return router;
}
