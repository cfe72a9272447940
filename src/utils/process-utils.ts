import { UI_CONSTANTS } from "../constants/ui.js";
import { displayUserFriendlyError } from "./enhanced-error-handler.js";

// Leave stdout a moment to flush before exiting.
export const exitProcess = (exitCode: number = 0): void => {
  setTimeout(() => process.exit(exitCode), UI_CONSTANTS.EXIT_DELAY_MS);
};

export const handleErrorImmediate = (error: unknown): never => {
  displayUserFriendlyError(error);
  process.exit(1);
};
