import type { RestoreOutcome } from "./restore-service";

function labelFor(outcome: RestoreOutcome, id: string): string {
  const label = outcome.plan.trackLabels.get(id);
  return label ? `${id} (${label})` : id;
}

export function formatSummary(outcome: RestoreOutcome): string {
  const { plan, result } = outcome;
  const lines = [
    `${outcome.dryRun ? "Planned" : "Restored"} ${plan.label}:`,
    `  to add: ${plan.changeSet.toAdd.length}, to remove: ${plan.changeSet.toRemove.length}, unchanged: ${plan.changeSet.unchanged.length}`
  ];

  if (!outcome.dryRun) {
    lines.push(`  added: ${result.added}, removed: ${result.removed}, skipped: ${result.skipped.length}, failed batches: ${result.failures.length}`);
  }

  if (outcome.createdPlaylist && outcome.playlistId) {
    lines.push(`  created playlist ${outcome.playlistId}`);
  }

  if (plan.ignored.length > 0) {
    lines.push(`  ignored: ${plan.ignored.length}`);
  }

  return lines.join("\n");
}

export function formatFull(outcome: RestoreOutcome): string {
  const { plan, result } = outcome;
  const lines = [formatSummary(outcome)];

  for (const id of plan.changeSet.toAdd) {
    lines.push(`  + ${labelFor(outcome, id)}`);
  }
  for (const id of plan.changeSet.toRemove) {
    lines.push(`  - ${labelFor(outcome, id)}`);
  }
  for (const id of plan.ignored) {
    lines.push(`  ~ ${labelFor(outcome, id)} (ignored)`);
  }
  for (const item of result.skipped) {
    lines.push(`  ! skipped ${item} (not found in catalog)`);
  }
  for (const failure of result.failures) {
    const status = failure.status === null ? "no status" : `status ${failure.status}`;
    lines.push(`  ! ${failure.operation} failed for ${failure.items.length} item(s) (${status}): ${failure.message}`);
  }

  return lines.join("\n");
}
