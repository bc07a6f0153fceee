import http from "http";
import express from "express";
import multer from "multer";
import { errorHandler } from "../errorHandler";
import { StorageWriteError } from "../../utils/errors";

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

const failures: Record<string, () => Error> = {
  storage: () => new StorageWriteError("write failed"),
  upload: () => new multer.MulterError("LIMIT_FILE_SIZE"),
  multer: () => new multer.MulterError("LIMIT_UNEXPECTED_FILE", "video"),
  validation: () => namedError("ValidationError", "Device name is required"),
  cast: () => namedError("CastError", "Cast to ObjectId failed"),
  duplicate: () => Object.assign(new Error("E11000 duplicate key"), { code: 11000 }),
  unknown: () => new Error("something broke"),
};

describe("errorHandler", () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get("/:failure", (req, _res, next) => {
      const failure = failures[req.params.failure];
      next(failure ? failure() : new Error("no such failure"));
    });
    app.use(errorHandler);

    server = http.createServer(app);
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server is not listening");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it.each([
    ["storage", 500, "write failed"],
    ["upload", 413, "Image too large"],
    ["multer", 400, "Unexpected field"],
    ["validation", 400, "Device name is required"],
    ["cast", 400, "Invalid ID format"],
    ["duplicate", 409, "Duplicate entry"],
    ["unknown", 500, "Internal server error"],
  ])("maps %s errors to %i", async (failure, status, message) => {
    const res = await fetch(`${baseUrl}/${failure}`);
    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ success: false, message });
  });
});
