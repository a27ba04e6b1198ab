import { TranscriptEntry, MatchTranscript } from "../types/match";
import { hashState, chainHash } from "./Crypto";

/**
 * Hash-chained move log. Each entry commits to the state it produced and to
 * the previous link, so replaying the same moves yields the same root hash.
 */
export class TranscriptBuilder {
  private readonly entries: TranscriptEntry[] = [];
  private currentHash: string;

  constructor(
    private readonly matchId: string,
    private readonly gameId: string,
    initialState: unknown
  ) {
    this.currentHash = hashState(initialState);
  }

  addEntry(playerId: string, action: unknown, newState: unknown): TranscriptEntry {
    const entry: TranscriptEntry = {
      sequence: this.entries.length,
      playerId,
      action,
      stateHash: hashState(newState),
      prevHash: this.currentHash,
    };

    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);
    return entry;
  }

  getTranscript(): MatchTranscript {
    return {
      matchId: this.matchId,
      gameId: this.gameId,
      entries: [...this.entries],
      rootHash: this.currentHash,
    };
  }

  getEntryCount(): number {
    return this.entries.length;
  }
}
