export { envSchema, parseEnv, missingCredentials, assertCredentials } from "./env.js";
