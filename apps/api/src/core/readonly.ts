import { ENV } from "../config/env";
import { AppError } from "./errors";

export function assertWritable(): void {
  if (ENV.TRIPNEST_READONLY) {
    throw new AppError(503, "Service is in read-only maintenance mode", "read_only");
  }
}
