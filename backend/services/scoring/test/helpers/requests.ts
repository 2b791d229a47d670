// backend/services/scoring/test/helpers/requests.ts
import { adminToken, userToken } from "../../src/auth/checkAuth";

type Body = Record<string, unknown>;

/** Signed user envelope for `method`. */
export function userBody(method: string, args: unknown, extra: Body = {}): Body {
  const account = "horns&hoofs";
  const login = "h&f";
  return {
    account,
    login,
    method,
    token: userToken(account, login),
    arguments: args,
    ...extra,
  };
}

/** Signed admin envelope for `method`, valid for the hour of `now`. */
export function adminBody(method: string, args: unknown, now = new Date()): Body {
  return {
    account: "horns&hoofs",
    login: "admin",
    method,
    token: adminToken(now),
    arguments: args,
  };
}
