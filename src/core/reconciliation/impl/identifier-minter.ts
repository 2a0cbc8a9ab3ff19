/**
 * Identifier Minter
 *
 * Ids for fields the target does not have yet. They only need to be unique
 * within the target project, so a truncated random UUID is checked against
 * every id already taken.
 */

import { randomUUID } from "node:crypto";
import { ErrorCode, MigrationToolError } from "../../errors.js";
import { MINTED_ID_LENGTH } from "../interfaces/IReconciliation.js";

export type IdGenerator = () => string;

const MAX_ATTEMPTS = 100;

export function randomIdGenerator(): string {
  return randomUUID().replace(/-/g, "").slice(0, MINTED_ID_LENGTH);
}

export class IdentifierMinter {
  private readonly taken = new Set<string>();

  constructor(private readonly generate: IdGenerator = randomIdGenerator) {}

  /**
   * Mark ids that already exist on the target
   */
  reserve(ids: Iterable<string>): void {
    for (const id of ids) {
      this.taken.add(id);
    }
  }

  mint(): string {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const id = this.generate();
      if (!this.taken.has(id)) {
        this.taken.add(id);
        return id;
      }
    }
    throw new MigrationToolError(
      `Could not mint a unique identifier after ${MAX_ATTEMPTS} attempts`,
      ErrorCode.UNKNOWN_ERROR,
      { reserved: this.taken.size }
    );
  }
}
