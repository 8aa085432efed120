import { startMcpServer } from "../interface/mcp/movie-retrieval-server";

/**
 * Serves the movie retrieval tools on stdio. Any startup failure, such as an
 * invalid environment, is reported on stderr and ends the process with code 1.
 */
export async function runCli(
  start: () => Promise<void> = startMcpServer,
): Promise<void> {
  try {
    await start();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[ERROR] Movie retrieval server failed to start: ${reason}`);
    process.exit(1);
  }
}
