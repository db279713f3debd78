import { Router, type RequestHandler } from "express";
import { loginSchema, signupSchema, toOwnUser } from "@shared/schema";
import type { UserService } from "../services/userService";
import { parseInput } from "../middleware/validation";
import { Errors } from "../utils/apiError";
import { sendResult, sendUnexpected } from "./shared";

export interface AuthRouterDeps {
  users: UserService;
  loginLimiter: RequestHandler;
  signupLimiter: RequestHandler;
}

export function createAuthRouter({ users, loginLimiter, signupLimiter }: AuthRouterDeps): Router {
  const router = Router();

  // POST /login: name + password for a bearer token
  router.post("/login", loginLimiter, async (req, res) => {
    const body = parseInput(loginSchema, req.body, res);
    if (!body) return;

    try {
      const token = await users.login(body.name, body.password);
      if (!token) {
        return Errors.unauthorized(res, "INVALID_CREDENTIALS", "invalid username or password");
      }
      res.json({ token });
    } catch (error) {
      sendUnexpected(req, res, error, "Login failed");
    }
  });

  // POST /signup: create an account
  router.post("/signup", signupLimiter, async (req, res) => {
    const body = parseInput(signupSchema, req.body, res);
    if (!body) return;

    try {
      const result = await users.create({
        name: body.name,
        email: body.email,
        password: body.password,
      });
      sendResult(res, result, 201, toOwnUser);
    } catch (error) {
      sendUnexpected(req, res, error, "Signup failed");
    }
  });

  return router;
}
