/**
 * CLI command execution
 *
 * Every printed user agent goes through the selection service, so the
 * configured rate limit (MAX_REQUESTS_PER_MINUTE per RATE_LIMIT_WINDOW_MS)
 * caps how many one invocation may print.
 */

import type { AppConfig } from "@/types/config";
import type { UserAgentManager } from "@/catalog/manager";
import { RateLimiter } from "@/rateLimit/rateLimiter";
import { createSelectionService } from "@/selection/selectionService";
import * as logger from "@/logger";
import type { CliArgs } from "./args";

/** Client key for all calls made by one CLI process */
export const CLI_CLIENT_KEY = "cli";

/**
 * Run one CLI command and return the process exit code.
 *
 * @throws {RangeError} If the configured rate limit is invalid
 */
export async function runCli(
  args: CliArgs,
  config: AppConfig,
  manager: UserAgentManager,
  write: (line: string) => void = (line) => console.log(line),
): Promise<number> {
  const service = createSelectionService({
    manager,
    limiter: new RateLimiter(config.rateLimit.maxRequests, config.rateLimit.windowMs),
  });

  if (args.list && args.category !== "random") {
    const outcome = await service.list({ category: args.category, clientKey: CLI_CLIENT_KEY });
    if (!outcome.ok) {
      logger.warn("Rate limit reached", { retryAfterMs: outcome.retryAfterMs });
      return 1;
    }
    write(JSON.stringify(outcome.entries, null, 2));
    return 0;
  }

  for (let i = 0; i < args.count; i++) {
    const outcome = await service.select({
      category: args.category,
      clientKey: CLI_CLIENT_KEY,
      endpoint: `cli/${args.category}`,
    });

    if (outcome.ok) {
      write(outcome.userAgent);
      continue;
    }

    if (outcome.reason === "RATE_LIMITED") {
      logger.warn("Rate limit reached", {
        printed: i,
        requested: args.count,
        retryAfterMs: outcome.retryAfterMs,
      });
    } else {
      logger.error("User-agent selection failed", { message: outcome.message });
    }
    return 1;
  }

  return 0;
}
