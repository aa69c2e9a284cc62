#!/usr/bin/env tsx

import { createProgram } from "./program";

await createProgram().parseAsync();
