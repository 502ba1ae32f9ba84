import { config } from "dotenv-flow";
import fs from "fs";

if (fs.existsSync(".env") && process.env.NODE_ENV !== "production") {
    config({ node_env: process.env.NODE_ENV, default_node_env: "development", silent: true });
}
