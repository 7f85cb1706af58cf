/**
 * Application Initialization
 * Ensures the download root exists on startup.
 */

import { mkdir } from "fs/promises";
import path from "path";

/**
 * Initializes application dependencies on startup.
 * Returns the absolute download root.
 */
export async function initializeApp(downloadDir: string): Promise<string> {
  console.log("Initializing application...");

  try {
    const root = path.resolve(downloadDir);
    await mkdir(root, { recursive: true });
    console.log(`✓ Download directory ready: ${root}`);
    console.log("✓ Application initialized successfully\n");
    return root;
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
