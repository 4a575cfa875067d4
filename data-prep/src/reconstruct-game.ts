#!/usr/bin/env tsx
/**
 * Reconstruct and store the on-court lineups for one game
 * Usage: npx tsx data-prep/src/reconstruct-game.ts <games.sqlite> <gameId> [--verbose] [--dry-run]
 */

import { existsSync } from 'fs';
import { reconstructLineups } from '@oncourt/lineups';
import { GameStore } from './game-store.js';

const args = process.argv.slice(2);
const verbose = args.includes('--verbose');
const dryRun = args.includes('--dry-run');
const [dbPath, gameId] = args.filter((arg) => !arg.startsWith('--'));

function main(): void {
  if (!dbPath || !gameId) {
    console.error('Usage: reconstruct-game <games.sqlite> <gameId> [--verbose] [--dry-run]');
    process.exitCode = 1;
    return;
  }

  if (!existsSync(dbPath)) {
    console.error(`[reconstruct-game] Database not found: ${dbPath}`);
    process.exitCode = 1;
    return;
  }

  const store = new GameStore(dbPath, { readonly: dryRun });
  try {
    console.log(`[reconstruct-game] Loading game ${gameId} from ${dbPath}...`);
    const input = store.loadGameInput(gameId);
    console.log(
      `[reconstruct-game] ${input.events.length} events, ` +
        `${input.rosters.home.playerIds.length} home / ${input.rosters.visitor.playerIds.length} visitor players`
    );

    const { intervals, lineups } = reconstructLineups(input, { verbose });
    console.log(`[reconstruct-game] ${intervals.length} stints, ${lineups.length} lineup rows`);

    if (dryRun) {
      console.log(`[reconstruct-game] Dry run, nothing written`);
      return;
    }
    store.saveLineups(lineups);
    console.log(`✅ Lineups saved for game ${gameId}`);
  } catch (error) {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    console.error(`[reconstruct-game] Failed: ${message}`);
    process.exitCode = 1;
  } finally {
    store.close();
  }
}

main();
