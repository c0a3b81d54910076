#!/usr/bin/env node

import { errorMessage } from "@assist-deploy/engine";
import { createProgram } from "./index";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  });
