import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { AppConfig } from "../config/env";
import logger from "../logger";

export interface TokenClaims {
  userId: number;
  userName: string;
}

const claimsSchema = z.object({
  userId: z.number().int().positive(),
  userName: z.string().min(1),
});

export class TokenExpiredError extends Error {
  constructor() {
    super("expired token");
    this.name = "TokenExpiredError";
  }
}

export class TokenMalformedError extends Error {
  constructor() {
    super("invalid token");
    this.name = "TokenMalformedError";
  }
}

const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Password hashing and session tokens. Holds no state beyond its options.
 */
export class AuthService {
  // Verified against when a login names no usable account, so every failure costs one bcrypt compare
  private dummyHash?: Promise<string>;

  constructor(private readonly options: AppConfig["auth"]) {}

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.options.bcryptRounds);
  }

  async verifyPassword(password: string, hash: string | null): Promise<boolean> {
    if (!hash) {
      await bcrypt.compare(password, await this.getDummyHash());
      return false;
    }
    try {
      return await bcrypt.compare(password, hash);
    } catch (error) {
      logger.warn("Malformed password hash", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  issueToken(claims: TokenClaims): string {
    return jwt.sign({ userId: claims.userId, userName: claims.userName }, this.options.jwtSecret, {
      algorithm: this.options.jwtAlgorithm,
      expiresIn: this.options.tokenTtlDays * SECONDS_PER_DAY,
    });
  }

  /**
   * @throws TokenExpiredError past `exp`
   * @throws TokenMalformedError for a bad signature, structure or claim shape
   */
  decodeToken(token: string): TokenClaims {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.jwtSecret, {
        algorithms: [this.options.jwtAlgorithm],
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) throw new TokenExpiredError();
      throw new TokenMalformedError();
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) throw new TokenMalformedError();
    return parsed.data;
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= bcrypt.hash("placeholder-password", this.options.bcryptRounds);
    return this.dummyHash;
  }
}
