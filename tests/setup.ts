import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { configureLogger } from '../src/utils/logger.js';

configureLogger({ directory: mkdtempSync(path.join(os.tmpdir(), 'paced-relay-logs-')) });
