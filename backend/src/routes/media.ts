/**
 * Media Routes
 *
 * - GET /media/:filename - Serve a file from the open profile's media
 *   directory
 *
 * Errors are plain text: 400 for an unusable name, 404 for a missing file,
 * 503 when no profile is open.
 */

import { Hono } from "hono";
import type { ProfileManager } from "../host/profile-manager";
import { getMimeType, normalizeMediaName } from "../host/media-store";
import { isActionError } from "../errors";

export const MEDIA_CACHE_CONTROL = "public, max-age=31536000";

export function createMediaRoutes(profiles: ProfileManager): Hono {
  const routes = new Hono();

  routes.get("/:filename", async (c) => {
    const media = profiles.media();
    if (!media) {
      return c.text("Service Unavailable: no collection is open", 503);
    }

    const filename = normalizeMediaName(c.req.param("filename"));
    let content: Buffer | null;
    try {
      content = await media.read(filename);
    } catch (error) {
      if (isActionError(error)) {
        return c.text(`Bad Request: ${error.message}`, 400);
      }
      throw error;
    }
    if (content === null) {
      return c.text("Not Found: Media file does not exist", 404);
    }

    return c.body(new Uint8Array(content), 200, {
      "Content-Type": getMimeType(filename),
      "Cache-Control": MEDIA_CACHE_CONTROL,
    });
  });

  return routes;
}
