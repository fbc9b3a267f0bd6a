import dotenv from "dotenv";
import { hideBin } from "yargs/helpers";
import { createCli } from "./commands";
import { loadConfig } from "./config";
import { reportError } from "./errors";

dotenv.config();

async function main() {
  const config = loadConfig();
  await createCli(config, hideBin(process.argv)).parseAsync();
}

main().catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});
