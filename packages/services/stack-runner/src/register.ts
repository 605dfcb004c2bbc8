// Imported first by main so LOG_LEVEL and friends from .env are visible to
// every logger created at module load.
import { loadEnvironmentFile } from './config/env-file';

loadEnvironmentFile();
