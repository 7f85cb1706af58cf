/**
 * File Controller
 * Serves downloaded files from {downloadDir}/{date}/{folder}/{filename}.
 */

import type { Request, Response, NextFunction } from "express";
import { realpath, stat } from "fs/promises";
import path from "path";
import { ForbiddenError, NotFoundError } from "../utils/errors.js";

/**
 * True when `target` is `root` or lies beneath it.
 */
export function isInsideRoot(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (relative === "") {
    return true;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Rejects any request whose decoded path contains a `..` segment.
 */
export function rejectTraversal(req: Request, _res: Response, next: NextFunction): void {
  let decoded: string;
  try {
    decoded = decodeURIComponent(req.path);
  } catch {
    next(new ForbiddenError());
    return;
  }

  const hasParentSegment = decoded.split(/[\\/]/).some((segment) => segment === "..");
  next(hasParentSegment ? new ForbiddenError() : undefined);
}

export function createFileController(downloadDir: string) {
  const root = path.resolve(downloadDir);

  return {
    /**
     * GET /files/:date/:folder/:filename
     */
    async downloadFile(
      req: Request<{ date: string; folder: string; filename: string }>,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const { date, folder, filename } = req.params;
        const requested = path.resolve(root, date, folder, filename);

        if (!isInsideRoot(root, requested)) {
          throw new ForbiddenError();
        }

        let canonical: string;
        try {
          canonical = await realpath(requested);
        } catch {
          throw new NotFoundError("File");
        }

        // Symlinks inside the root may still point elsewhere
        if (!isInsideRoot(await realpath(root), canonical)) {
          throw new ForbiddenError();
        }

        if (!(await stat(canonical)).isFile()) {
          throw new NotFoundError("File");
        }

        res.download(canonical, filename, { dotfiles: "allow" }, (error) => {
          if (!error) {
            return;
          }
          if (res.headersSent) {
            console.error(`[files] Transfer of ${canonical} aborted:`, error.message);
          } else {
            next(error);
          }
        });
      } catch (error) {
        next(error);
      }
    },
  };
}
