import { ErrorCode } from "@slack/web-api";
import type { WebAPIPlatformError } from "@slack/web-api";

function isPlatformError(err: unknown): err is WebAPIPlatformError {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === ErrorCode.PlatformError &&
    "data" in err
  );
}

/**
 * Normalises a Slack client failure to a string. Platform errors are reported
 * by their API error code (`channel_not_found`, `not_authed`, ...).
 */
export function describeSlackError(err: unknown): string {
  if (isPlatformError(err)) {
    return err.data.error;
  }
  return err instanceof Error ? err.message : String(err);
}
