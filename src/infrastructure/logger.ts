import pino from "pino";
import type { Logger } from "pino";

import { env } from "../config/env.js";

export type { Logger };

export const logger: Logger =
  env.NODE_ENV === "production"
    ? pino({
        level: env.LOG_LEVEL
      })
    : pino({
        level: env.LOG_LEVEL,
        transport:
          env.NODE_ENV === "test"
            ? undefined
            : {
                target: "pino/file",
                options: {
                  destination: 1
                }
              }
      });
