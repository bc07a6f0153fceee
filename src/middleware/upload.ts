/**
 * Push Upload Middleware
 *
 * Multipart pushes carry a single WebP image in the `image` field. Files stay
 * in memory; they are small and go straight to the device or the image cache.
 */

import multer, { FileFilterCallback } from "multer";
import { Request } from "express";
import { config } from "../config";
import { InvalidPushPayloadError } from "../utils/errors";

const fileFilter = (req: Request, file: Express.Multer.File, cb: FileFilterCallback): void => {
  const mimeType = file.mimetype.toLowerCase();

  if (config.upload.allowedMimeTypes.includes(mimeType)) {
    cb(null, true);
  } else {
    cb(new InvalidPushPayloadError(`File type not allowed: ${mimeType}. Allowed types: ${config.upload.allowedMimeTypes.join(", ")}`));
  }
};

const storage = multer.memoryStorage();

export const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: config.upload.maxFileSize,
    files: 1,
  },
});

/** Accepts an optional `image` file; JSON pushes pass through untouched. */
export const pushImageUpload = upload.single("image");
