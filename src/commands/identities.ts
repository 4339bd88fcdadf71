import { loadConfig } from "../config";
import { LookalikeStore, restoreDatabase } from "../db";
import type { Identity, IdentityFailure } from "../pipeline/types";

interface IdentitiesListOptions {
  missing?: boolean;
  json?: boolean;
}

function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width - 3) + "..." : value;
}

export async function identitiesListCommand(options: IdentitiesListOptions): Promise<void> {
  const config = loadConfig();
  const store = new LookalikeStore(config.database.path);

  try {
    const all = restoreDatabase(store).snapshot().identities;
    const identities = options.missing ? all.filter((identity) => identity.embedding === null) : all;

    if (options.json) {
      console.log(
        JSON.stringify(
          identities.map((identity) => ({
            name: identity.name,
            folder: identity.folder,
            imagePath: identity.imagePath,
            hasEmbedding: identity.embedding !== null,
          })),
          null,
          2
        )
      );
      return;
    }

    if (all.length === 0) {
      console.log("No identities found. Run 'lookalike scan <path>' first.");
      return;
    }
    if (identities.length === 0) {
      console.log("Every identity has a face embedding.");
      return;
    }

    const headers = ["Name", "Embedding", "Image"];
    const widths = [30, 11, 50];
    const divider = widths.map((w) => "─".repeat(w)).join("─");

    console.log(options.missing ? "\nIdentities without a face embedding:" : "\nIdentities:");
    console.log(divider);
    console.log(headers.map((h, i) => h.padEnd(widths[i])).join(" "));
    console.log(divider);

    for (const identity of identities) {
      const row = [
        truncate(identity.name, widths[0]),
        identity.embedding ? "yes" : "-",
        identity.imagePath ?? "(no image)",
      ];
      console.log(row.map((v, i) => v.padEnd(widths[i])).join(" "));
    }

    console.log(divider);
    console.log(`\n${identities.length} identity(ies).`);
  } finally {
    store.close();
  }
}

interface IdentitiesShowOptions {
  json?: boolean;
}

export async function identitiesShowCommand(name: string, options: IdentitiesShowOptions): Promise<void> {
  const config = loadConfig();
  const store = new LookalikeStore(config.database.path);

  try {
    const identities = restoreDatabase(store).snapshot().identities;

    // Case-insensitive lookup
    const identity: Identity | undefined =
      identities.find((candidate) => candidate.name === name) ??
      identities.find((candidate) => candidate.name.toLowerCase() === name.toLowerCase());

    if (!identity) {
      console.log(`Identity "${name}" not found.`);
      process.exitCode = 1;
      return;
    }

    const failure: IdentityFailure | null =
      store.getLastScan()?.errorList.find((entry) => entry.identity === identity.name) ?? null;

    if (options.json) {
      console.log(JSON.stringify({ ...identity, lastScanError: failure }, null, 2));
      return;
    }

    console.log(`\nIdentity: ${identity.name}`);
    console.log(`  Folder: ${identity.folder}`);
    console.log(`  Image: ${identity.imagePath ?? "(none)"}`);
    if (identity.imageHash) {
      console.log(`  Image SHA-256: ${identity.imageHash}`);
    }
    console.log(
      `  Embedding: ${identity.embedding ? `${identity.embedding.length} dimensions` : "none"}`
    );
    if (failure) {
      console.log(`  Last scan: ${failure.reason} - ${failure.message}`);
    }
  } finally {
    store.close();
  }
}
