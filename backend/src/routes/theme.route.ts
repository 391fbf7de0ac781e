// Stores the colour scheme override; flow is POST /theme(form) -> cookie -> redirect back to the page.
import express, { Router, type Request } from "express";
import type { ThemePreference } from "@gitview/contracts";
import { HttpRouteError } from "../domain/http-route-error.js";
import { sendRouteError } from "./http.js";

export const THEME_COOKIE = "gitview_theme";

const THEME_COOKIE_MAX_AGE_MS = 365 * 24 * 60 * 60 * 1000;
const FOLLOW_SYSTEM = "system";

export function isThemePreference(value: unknown): value is ThemePreference {
  return value === "light" || value === "dark";
}

export function readThemePreference(req: Request): ThemePreference | null {
  const raw: unknown = req.cookies?.[THEME_COOKIE];
  return isThemePreference(raw) ? raw : null;
}

// Only same-host referrers are followed; anything else returns to the overview.
export function themeRedirectTarget(req: Request): string {
  const referrer = req.get("Referrer");
  const host = req.get("Host");

  if (!referrer || !host) {
    return "/";
  }

  try {
    const url = new URL(referrer, `http://${host}`);
    return url.host === host ? `${url.pathname}${url.search}` : "/";
  } catch {
    return "/";
  }
}

export function createThemeRoute(): Router {
  const router = Router();

  router.post("/theme", express.urlencoded({ extended: false }), (req, res) => {
    const choice: unknown = req.body?.theme;

    try {
      if (choice === FOLLOW_SYSTEM) {
        res.clearCookie(THEME_COOKIE, { path: "/" });
      } else if (isThemePreference(choice)) {
        res.cookie(THEME_COOKIE, choice, {
          path: "/",
          maxAge: THEME_COOKIE_MAX_AGE_MS,
          httpOnly: true,
          sameSite: "lax",
        });
      } else {
        throw new HttpRouteError(400, "INVALID_THEME", "theme must be one of system, light, dark");
      }

      res.redirect(303, themeRedirectTarget(req));
    } catch (error) {
      sendRouteError(req, res, error);
    }
  });

  return router;
}
