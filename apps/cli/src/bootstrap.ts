// Imported before anything else so module-level loggers see these values.
import "dotenv/config";

process.env["LOG_LEVEL"] ??= "warn";
