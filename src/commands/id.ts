import pc from "picocolors";
import type { AppConfig } from "../config";
import { openSession } from "../session";

export async function idCommand(config: AppConfig, spotifyId: string): Promise<void> {
  const { client, accessToken } = await openSession(config);
  const resource = await client.resolveId(spotifyId, accessToken);

  if (!resource) {
    throw new Error(`No resource found with ID ${spotifyId}`);
  }

  console.log(`${pc.bold(resource.type)} ${resource.name} ${pc.dim(resource.uri)}`);
}
