import * as p from "@clack/prompts";
import { createSyncEngine, exitCodeFor, runSync } from "@/sync";
import type { SyncConfig } from "@/sync/config/env";
import { formatWatermark } from "@/sync/ledger/watermark";
import type { SyncMode, SyncRunSummary } from "@/sync/types";

function formatPreview(summary: SyncRunSummary): string[] {
  const { recordsRead, recordsMapped, recordsSkipped, batchesBuilt } = summary.counts;
  const lines = [`${recordsRead} records found, ${recordsMapped} ready to send in ${batchesBuilt} batches`];
  if (recordsSkipped > 0) {
    lines.push(`${recordsSkipped} records would be skipped (invalid data)`);
    for (const skipped of summary.skippedRecords.slice(0, 5)) {
      lines.push(`  TJ${skipped.jobId ?? "?"}: ${skipped.issues.join("; ")}`);
    }
  }
  return lines;
}

/** Guided run. `signal` cancels an in-progress preview or sync after its in-flight batch. */
export async function runInteractiveSync(config: SyncConfig, signal?: AbortSignal): Promise<number> {
  p.intro("Revenue Forecast Sync");

  const engine = createSyncEngine(config);
  try {
    const { store } = engine.deps;
    const state = store.load();
    const [lastRun] = store.recentRuns(1);
    p.log.info(`Synced up to: ${formatWatermark(state.watermark)}`);
    if (lastRun) {
      p.log.message(`Last run ${lastRun.startedAt} (${lastRun.mode}): ${lastRun.status}`);
    }
    if (state.fullScan) {
      p.log.warn(`A full refresh was interrupted after TJ${state.fullScan.afterJobId}; a full sync will resume it.`);
    }

    const choice = await p.select({
      message: "Which sync do you want to run?",
      options: [
        { value: "incremental", label: "Incremental", hint: "changes since the last sync" },
        { value: "full", label: "Full refresh", hint: "every job since the start date" },
      ],
      initialValue: "incremental",
    });
    if (p.isCancel(choice)) {
      p.outro("Sync cancelled.");
      return 0;
    }
    const mode: SyncMode = choice === "full" ? "full" : "incremental";

    const previewSpinner = p.spinner();
    previewSpinner.start("Checking the source for changes...");
    const preview = await runSync(engine.deps, config, { mode, dryRun: true, signal });
    if (preview.status !== "completed") {
      previewSpinner.stop("Failed to read the source.");
      p.log.error(preview.failure?.error ?? "Preview did not complete.");
      p.outro("Sync could not start. Check your settings and try again.");
      return 1;
    }
    previewSpinner.stop("Source checked.");

    if (preview.counts.recordsRead === 0) {
      p.log.success("Everything is up to date!");
      p.outro("Nothing to sync.");
      return 0;
    }
    for (const line of formatPreview(preview)) {
      p.log.message(line);
    }

    if (config.dryRun) {
      p.log.warn("Dry run: nothing will be sent to the webhook.");
      p.outro("Done!");
      return 0;
    }

    const confirmed = await p.confirm({
      message: `Send ${preview.counts.recordsMapped} records to the webhook?`,
    });
    if (p.isCancel(confirmed) || !confirmed) {
      p.outro("Sync cancelled.");
      return 0;
    }

    const syncSpinner = p.spinner();
    syncSpinner.start("Syncing...");
    const summary = await runSync(engine.deps, config, { mode, signal });
    syncSpinner.stop(
      summary.status === "completed" ? "Sync finished." : summary.status === "cancelled" ? "Sync cancelled." : "Sync failed.",
    );

    const { batchesSent, batchesFailed, inserted, updated } = summary.counts;
    if (summary.failure) {
      p.log.error(`${summary.failure.stage}: ${summary.failure.error}`);
    }
    if (batchesFailed > 0) {
      p.log.warn(`${batchesSent} batches sent, ${batchesFailed} failed. Check the log for details.`);
      for (const failed of summary.failedBatches) {
        p.log.message(`  Batch ${failed.sequence} (TJ${failed.firstJobId}..TJ${failed.lastJobId}): ${failed.errorDetail ?? failed.outcome}`);
      }
    } else if (batchesSent > 0) {
      p.log.success(`${batchesSent} batches sent (${inserted} inserted, ${updated} updated).`);
    }
    p.log.info(`Synced up to: ${formatWatermark(summary.finalWatermark)}`);

    p.outro("Done!");
    return exitCodeFor(summary);
  } finally {
    await engine.close();
  }
}
