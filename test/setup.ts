/**
 * @file setup.ts
 * @description Test setup and environment configuration
 */

import dotenv from "dotenv";
import path from "path";

// Load .env file first
const envPath = path.resolve(__dirname, "../.env");
dotenv.config({ path: envPath });

// Setup test environment variables
process.env.NODE_ENV = "test";
process.env.PORT = "8001"; // Use different port for testing
process.env.LOG_LEVEL = "error";

// Engine arguments from a developer's .env must not leak into assertions
delete process.env.ENGINE_ARGS;
delete process.env.ENGINE_PATH;
