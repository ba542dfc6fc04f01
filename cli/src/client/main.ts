#!/usr/bin/env -S npx tsx
import { createProgram } from "./cli";

await createProgram().parseAsync(process.argv);
