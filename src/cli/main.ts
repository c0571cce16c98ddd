#!/usr/bin/env node
import { program } from './index.js';

await program.parseAsync(process.argv);
