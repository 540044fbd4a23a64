#!/usr/bin/env node

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { createProgram } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
const version =
  packageJson && typeof packageJson === "object" && "version" in packageJson && typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

await createProgram({ version }).parseAsync(process.argv);
