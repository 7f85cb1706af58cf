/**
 * HTTP Server Entry Point
 * Starts the Express application together with the download worker pool.
 * Handles graceful shutdown on SIGTERM/SIGINT.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import { DOWNLOAD_DIR, PORT, VIDEO_INFO_WAIT_MS, WORKER_CONCURRENCY } from "./config/env.js";
import { createRedisConnection } from "./config/redis.js";
import { createDownloadQueue } from "./config/queues.js";
import { InMemoryTaskStore } from "./repositories/taskRepository.js";
import { TaskService } from "./services/business/taskService.js";
import { BullTaskQueue } from "./services/external/queue/downloadQueue.js";
import { YtdlpExtractor } from "./services/external/ytdlp.js";
import { startDownloadWorker } from "./jobs/workers/downloadTask.worker.js";

async function main(): Promise<void> {
  const downloadDir = await initializeApp(DOWNLOAD_DIR);

  const queueConnection = createRedisConnection("queue");
  const workerConnection = createRedisConnection("worker");

  const queue = new BullTaskQueue(createDownloadQueue(queueConnection));
  const tasks = new TaskService(new InMemoryTaskStore(), queue);

  // Task records live in this process, so the worker pool does too
  const worker = startDownloadWorker({
    connection: workerConnection,
    concurrency: WORKER_CONCURRENCY,
    tasks,
    context: { downloadDir, extractor: new YtdlpExtractor() },
  });

  const app = createApp({ tasks, downloadDir, videoInfoWaitMs: VIDEO_INFO_WAIT_MS });

  /** HTTP server instance wrapping the Express application. */
  const server = createServer(app);

  server.listen(PORT, "0.0.0.0", () => {
    console.log(`Server running on 0.0.0.0:${PORT}`);
    console.log("✓ Server ready to accept requests\n");
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`${signal} received, shutting down...`);

    server.close(() => {
      Promise.all([worker.close(), queue.close()])
        .then(() => Promise.all([queueConnection.quit(), workerConnection.quit()]))
        .then(() => process.exit(0))
        .catch((error) => {
          console.error("✗ Shutdown failed:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("✗ Initialization failed:", error);
  process.exit(1);
});
