import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logError } from "../utils/errorHandler";
import { configureLogger, logInfo } from "../utils/logger";
import { TRAVEL_CAPABILITIES } from "./capabilities";
import { makeProviderContext } from "./context";
import { createProviderServer } from "./createProvider";

// stdout carries the protocol
configureLogger({ stream: "stderr", fileName: "provider" });

async function main(): Promise<void> {
  const server = createProviderServer(makeProviderContext(), TRAVEL_CAPABILITIES);
  await server.connect(new StdioServerTransport());
  logInfo(`[Provider] Serving ${TRAVEL_CAPABILITIES.length} capabilities over stdio`);
}

main().catch((error) => {
  logError("Provider", error);
  process.exit(1);
});
