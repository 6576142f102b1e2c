// Imported first by the service entry point so `.env` values are in
// process.env before monitoring and logging read it.
import { config } from "dotenv";
import { expand } from "dotenv-expand";

expand(config());
