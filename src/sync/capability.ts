import type { CommentGateway } from "../gitlab/gateway.js";
import type { Logger } from "../logger.js";
import { attempt } from "./outcome.js";

export const DEFAULT_MIN_INLINE_VERSION = "10.8.0";

type Version = [major: number, minor: number, patch: number];

/** Parse the leading `major.minor[.patch]` of a version string ("16.5.1-ee" → [16, 5, 1]). */
export function parseVersion(raw: string): Version | null {
  const match = raw.trim().match(/^v?(\d+)\.(\d+)(?:\.(\d+))?/);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10), match[3] ? parseInt(match[3], 10) : 0];
}

export function compareVersions(a: Version, b: Version): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

/**
 * Whether the platform accepts comments anchored to diff lines.
 * Anything that prevents a definite answer means no.
 */
export async function detectInlineSupport(
  gateway: CommentGateway,
  minVersion: string,
  logger: Logger,
): Promise<boolean> {
  const minimum = parseVersion(minVersion);
  if (!minimum) {
    logger.warn("Unparsable minimum inline version, disabling inline comments", { minVersion });
    return false;
  }

  const client = await attempt(() => gateway.clientVersion());
  if (!client.ok || !client.value) {
    logger.debug("Client version unknown, disabling inline comments");
    return false;
  }

  const server = await attempt(() => gateway.serverVersion());
  const serverVersion = server.ok && server.value ? parseVersion(server.value) : null;
  if (!serverVersion) {
    logger.debug("Server version unknown, disabling inline comments", { client: client.value });
    return false;
  }

  const supported = compareVersions(serverVersion, minimum) >= 0;
  logger.debug("Inline comment support", { client: client.value, server: serverVersion.join("."), supported });
  return supported;
}
