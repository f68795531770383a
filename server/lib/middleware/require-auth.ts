import type { User } from "@server/db/schema";
import type { UserStore } from "@server/lib/users";
import { statusPage } from "@server/views/layout";
import type { MiddlewareHandler } from "hono";
import { getSignedCookie } from "hono/cookie";
import { HTTPException } from "hono/http-exception";

export type AppEnv = {
  Variables: {
    user: User | undefined;
  };
};

export type SessionOptions = {
  users: UserStore;
  secret: string;
  cookieName: string;
};

/**
 * Resolves the signed session cookie (a user id) into the user's profile.
 * Issuing the cookie belongs to the sign-in flow, which lives elsewhere.
 */
export function sessionMiddleware(
  options: SessionOptions,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const value = await getSignedCookie(c, options.secret, options.cookieName);
    const userId = value ? Number.parseInt(value, 10) : Number.NaN;

    const user =
      Number.isInteger(userId) && userId > 0
        ? await options.users.get(userId)
        : null;
    c.set("user", user ?? undefined);

    await next();
  };
}

/**
 * Middleware that requires a signed-in user.
 * Returns 401 Unauthorized otherwise.
 */
export const requireUser: MiddlewareHandler<AppEnv> = async (c, next) => {
  if (!c.get("user")) {
    return c.html(statusPage("Unauthorized", "Please sign in first."), 401);
  }

  await next();
};

export function signedInUser(user: User | undefined): User {
  if (!user) {
    throw new HTTPException(401, { message: "Unauthorized" });
  }
  return user;
}
