import "reflect-metadata";
import { loadDatabaseConfig } from "../config/env";
import { createDataSource } from "./data-source";

// Entry point for the typeorm CLI (npm run migrate)
export default createDataSource(loadDatabaseConfig());
