import Elysia from "elysia";

export interface SecurityOptions {
  /** Send Strict-Transport-Security */
  readonly hsts: boolean;
}

export const securityPlugin = ({ hsts }: SecurityOptions) =>
  new Elysia({ name: "security", seed: { hsts } }).onRequest(({ set }) => {
    set.headers["X-Content-Type-Options"] = "nosniff";
    set.headers["X-Frame-Options"] = "DENY";
    set.headers["X-XSS-Protection"] = "1; mode=block";
    set.headers["Referrer-Policy"] = "strict-origin-when-cross-origin";
    set.headers["Permissions-Policy"] =
      "geolocation=(), microphone=(), camera=()";

    if (hsts)
      set.headers["Strict-Transport-Security"] =
        "max-age=31536000; includeSubDomains";
  });
