/**
 * Quick script to inspect the offline queue on disk
 *
 * Usage: npm run check-queue [-- --limit 20]
 */

import { config } from "../src/config.ts";
import { DurableQueue } from "../src/queue/durable-queue.ts";

const limitArg = process.argv.indexOf("--limit");
const limit = limitArg >= 0 ? Number(process.argv[limitArg + 1]) || 20 : 20;

const queue = new DurableQueue({ path: config.database.path, logLevel: "warn" });

console.log("═══════════════════════════════════════════════════════════════");
console.log("OFFLINE QUEUE");
console.log("═══════════════════════════════════════════════════════════════\n");
console.log(`Database: ${config.database.path}`);

const total = queue.countPending();
console.log(`Pending entries: ${total}\n`);

if (total === 0) {
  console.log("Offline queue is empty.");
  queue.close();
  process.exit(0);
}

const entries = queue.peekPending(total);

// Summary per target topic
const byTopic = new Map<string, number>();
for (const entry of entries) {
  byTopic.set(entry.targetTopic, (byTopic.get(entry.targetTopic) ?? 0) + 1);
}

console.log("Summary:");
for (const [topic, count] of byTopic) {
  console.log(`  - ${topic}: ${count}`);
}
const oldest = entries[0];
const newest = entries[entries.length - 1];
if (oldest && newest) {
  console.log(`  - Oldest: #${oldest.id} at ${oldest.enqueuedAt.toISOString()}`);
  console.log(`  - Newest: #${newest.id} at ${newest.enqueuedAt.toISOString()}`);
}

console.log("\n═══════════════════════════════════════════════════════════════");
console.log(`NEXT ${Math.min(limit, entries.length)} TO DRAIN`);
console.log("═══════════════════════════════════════════════════════════════\n");

for (const entry of entries.slice(0, limit)) {
  const readings = entry.payload.readings;
  const size = Array.isArray(readings) ? `batch of ${readings.length}` : "single record";
  console.log(`#${entry.id}  ${entry.enqueuedAt.toISOString()}  ${entry.targetTopic}  (${size})`);
}

queue.close();
