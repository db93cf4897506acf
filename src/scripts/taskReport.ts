/**
 * Print task counts per status, recent failures and duplicate content
 * Run with: npm run report -- [videoId]
 */

import "dotenv/config";
import { countTasksByExternalId, listTasks, TASK_STATUSES } from "../repositories/taskRepository.js";
import { findDuplicateContent } from "../services/business/reconciliationService.js";

const RECENT_FAILURES = 10;

async function taskReport() {
  const externalId = process.argv[2];

  try {
    if (externalId) {
      const count = await countTasksByExternalId(externalId);
      console.log(count > 0 ? `✓ ${externalId} is tracked` : `✗ ${externalId} has no task`);
    }

    const tasks = await listTasks();

    console.log(`Tasks: ${tasks.length}`);
    for (const status of TASK_STATUSES) {
      const count = tasks.filter((task) => task.status === status).length;
      console.log(`  ${status.padEnd(12)} ${count}`);
    }

    const failures = tasks
      .filter((task) => task.status === "failed")
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .slice(0, RECENT_FAILURES);

    if (failures.length > 0) {
      console.log("\nRecent failures:");
      for (const task of failures) {
        console.log(`  ${task.external_id} (retries: ${task.retry_count}) ${task.error_message ?? ""}`);
      }
    }

    const duplicates = findDuplicateContent(tasks);
    if (duplicates.length > 0) {
      console.log("\nDuplicate content:");
      for (const group of duplicates) {
        console.log(`  ${group.kind} ${group.hash.slice(0, 12)}… ${group.externalIds.join(", ")}`);
      }
    } else {
      console.log("\n✓ No duplicate content");
    }
  } catch (error) {
    console.error("Error building task report:", error);
    process.exit(1);
  }

  process.exit(0);
}

void taskReport();
