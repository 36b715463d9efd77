import { vi } from "vitest";

import type { Logger } from "@/lib/logger";

/** Logger whose methods are spies; `child` returns the same instance. */
export const createSpyLogger = () => {
  const logger = {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    child: vi.fn<Logger["child"]>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
};
