import { parseArgs } from "node:util";
import { AppServices } from "../app.js";
import { InputError, toAppError } from "../domain/errors.js";
import { CollectionStatus } from "../domain/types.js";
import { CliIo, withArgumentErrors } from "./io.js";

export const COLLECTION_USAGE = "Usage: npm run collection -- <status|create|clear|delete> [--force] [--yes]";

const COMMANDS = ["status", "create", "clear", "delete"] as const;

export type CollectionCommandName = (typeof COMMANDS)[number];

export interface CollectionArgs {
  command: CollectionCommandName;
  force: boolean;
  yes: boolean;
}

/** Asks the user a yes/no question; resolves to null when nobody can answer. */
export type Confirm = (question: string) => Promise<boolean | null>;

export function parseCollectionArgs(argv: string[]): CollectionArgs {
  const { values, positionals } = withArgumentErrors(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        force: { type: "boolean" },
        yes: { type: "boolean", short: "y" },
      },
    }),
  );

  const command = COMMANDS.find((name) => name === positionals[0]);
  if (!command || positionals.length !== 1) {
    throw new InputError("INVALID_ARGUMENTS", `Expected one command: ${COMMANDS.join(", ")}.`);
  }
  return { command, force: values.force ?? false, yes: values.yes ?? false };
}

export async function runCollectionCommand(
  args: CollectionArgs,
  services: AppServices,
  io: CliIo,
  confirm: Confirm,
): Promise<number> {
  const { config, collections } = services;
  const name = config.collectionName;

  try {
    switch (args.command) {
      case "status": {
        printStatus(io, await collections.status(name));
        return 0;
      }
      case "create": {
        const result = await collections.create(name, {
          dimension: config.vectorDimension,
          distance: config.vectorDistance,
          recreate: args.force,
        });
        if (result.action === "unchanged") {
          io.out(`Collection '${name}' already exists. Use --force to recreate it.`);
        } else {
          io.out(`Collection '${name}' ${result.action}.`);
        }
        printStatus(io, result.status);
        return 0;
      }
      case "clear": {
        const { removed } = await collections.clear(name);
        io.out(
          removed === 0 ? "Collection is already empty." : `Cleared ${removed} vectors from '${name}'.`,
        );
        return 0;
      }
      case "delete": {
        if (!args.yes) {
          const answer = await confirm(
            `Are you sure you want to delete collection '${name}'? (yes/no): `,
          );
          if (answer === null) {
            io.err("Refusing to delete without confirmation; pass --yes.");
            return 1;
          }
          if (!answer) {
            io.out("Deletion cancelled.");
            return 1;
          }
        }
        const { deleted } = await collections.delete(name);
        io.out(deleted ? `Deleted collection '${name}'.` : `Collection '${name}' does not exist.`);
        return 0;
      }
    }
  } catch (error) {
    io.err(toAppError(error).message);
    return 1;
  }
}

function printStatus(io: CliIo, status: CollectionStatus) {
  io.out(`name: ${status.name}`);
  io.out(`exists: ${status.exists}`);
  io.out(`vectors: ${status.vectorCount}`);
  if (status.config) {
    io.out(`dimension: ${status.config.dimension}`);
    io.out(`distance: ${status.config.distance}`);
  }
}
