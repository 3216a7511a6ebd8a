import { loadEnvFiles } from '../src/core/env';

loadEnvFiles();
