import { errorMessage } from "../core/errors";
import { logger } from "../observability/logger";
import { buildProgram } from "./index";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.cli.error(errorMessage(error));
    process.exitCode = 1;
  });
