import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { SaveGameError } from './SaveCodec';

/**
 * Where encoded saves live. Slots are plain names ("quicksave", "slot-2").
 */
export interface SaveStorage {
  /** null when the slot is empty */
  read(slot: string): Uint8Array | null;
  write(slot: string, data: Uint8Array): void;
}

const SLOT_PATTERN = /^[\w-]+$/;

export function assertValidSlot(slot: string): void {
  if (!SLOT_PATTERN.test(slot)) {
    throw new SaveGameError(`Invalid save slot name "${slot}"`);
  }
}

export class MemorySaveStorage implements SaveStorage {
  private slots: Map<string, Uint8Array> = new Map();

  public read(slot: string): Uint8Array | null {
    assertValidSlot(slot);
    const data = this.slots.get(slot);
    return data ? data.slice() : null;
  }

  public write(slot: string, data: Uint8Array): void {
    assertValidSlot(slot);
    this.slots.set(slot, data.slice());
  }

  public has(slot: string): boolean {
    return this.slots.has(slot);
  }
}

/**
 * One `<slot>.sav` file per slot inside `directory`
 */
export class FileSaveStorage implements SaveStorage {
  constructor(private readonly directory: string) {}

  public read(slot: string): Uint8Array | null {
    const path = this.pathOf(slot);
    if (!existsSync(path)) return null;
    return new Uint8Array(readFileSync(path));
  }

  public write(slot: string, data: Uint8Array): void {
    mkdirSync(this.directory, { recursive: true });
    writeFileSync(this.pathOf(slot), data);
  }

  private pathOf(slot: string): string {
    assertValidSlot(slot);
    return join(this.directory, `${slot}.sav`);
  }
}
