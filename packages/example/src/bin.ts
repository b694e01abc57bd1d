#!/usr/bin/env -S node --import tsx
import { readVersion, run } from '@cli-batteries/core';
import { app } from './app.js';

await run(readVersion(import.meta.url), app);
