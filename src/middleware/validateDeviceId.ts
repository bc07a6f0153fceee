import { Request, Response, NextFunction } from "express";
import { isValidDeviceId } from "../services/deviceState";
import { InvalidDeviceIdError } from "../utils/errors";

/** Rejects requests whose `:deviceId` is not 8 hex characters. */
export const validateDeviceId = (req: Request, _res: Response, next: NextFunction): void => {
  const { deviceId } = req.params;
  if (!deviceId || !isValidDeviceId(deviceId)) {
    next(new InvalidDeviceIdError(deviceId ?? ""));
    return;
  }
  next();
};
