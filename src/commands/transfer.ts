import pc from "picocolors";
import type { AppConfig } from "../config";
import { transferPlaylist } from "../restore-service";
import { openSession } from "../session";

export interface TransferOptions {
  dryRun?: boolean;
}

export async function transferCommand(
  config: AppConfig,
  sourceId: string,
  destinationId: string,
  options: TransferOptions
): Promise<void> {
  const { client, accessToken } = await openSession(config);
  const outcome = await transferPlaylist(client, accessToken, sourceId, destinationId, options);
  const { result } = outcome;

  const verb = options.dryRun ? "Would transfer" : "Transferred";
  const count = options.dryRun ? outcome.sourceCount - outcome.alreadyPresent : result.added;
  console.log(
    `${verb} ${count} tracks from "${outcome.sourceName}" (${sourceId}, ${outcome.sourceCount} tracks) ` +
      `to "${outcome.destinationName}" (${destinationId}, already had ${outcome.alreadyPresent} of them).`
  );

  if (result.skipped.length > 0) {
    console.log(pc.yellow(`Skipped ${result.skipped.length} tracks no longer in the catalog.`));
  }

  if (result.failures.length > 0) {
    throw new Error(`${result.failures.length} batch(es) failed while transferring`);
  }
}
