import { fetch } from "undici";
import { logger } from "../logger";
import { recordStatusUpdate } from "../metrics";
import type { StatusUpdate } from "../types/job";

export function statusEndpoint(backendUrl: string, projectId: string) {
  return `${backendUrl.replace(/\/$/, "")}/resultupload/${encodeURIComponent(projectId)}/`;
}

/**
 * Posts a status update for a project. Delivery is best effort: failures are
 * logged and reported through the return value, never thrown or retried.
 */
export async function sendStatusUpdate(
  update: StatusUpdate,
  opts?: { signal?: AbortSignal },
): Promise<boolean> {
  const url = statusEndpoint(update.backendUrl, update.projectId);
  logger.info({ projectId: update.projectId, status: update.status }, "Sending status update");
  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        authorization: `Token ${update.token}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({ status: update.status }),
      signal: opts?.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      logger.error(
        { projectId: update.projectId, status: update.status, httpStatus: response.status, text },
        "Status update rejected by backend",
      );
      recordStatusUpdate(update.status, false);
      return false;
    }

    await response.body?.cancel();
    logger.info({ projectId: update.projectId, httpStatus: response.status }, "Status update delivered");
    recordStatusUpdate(update.status, true);
    return true;
  } catch (err) {
    logger.error({ err, projectId: update.projectId, status: update.status, url }, "Status update failed");
    recordStatusUpdate(update.status, false);
    return false;
  }
}

export type StatusReporter = typeof sendStatusUpdate;
