import type { Event } from './events.js';

/**
 * Undo/redo journal. Events accumulate in an open patch until the client
 * commits; each committed patch is undone and redone as one unit.
 */
export class EditStack {
  private patch: Event[] = [];
  private readonly done: Event[][] = [];
  private undone: Event[][] = [];

  /** Events recorded since the last commit. */
  public get pending(): readonly Event[] {
    return this.patch;
  }

  public get canUndo(): boolean {
    return this.patch.length > 0 || this.done.length > 0;
  }

  public get canRedo(): boolean {
    return this.undone.length > 0;
  }

  /** Record an executed event. A fresh edit invalidates redo history. */
  public exe(event: Event): void {
    this.patch.push(event);
    this.undone = [];
  }

  public commit(): void {
    if (this.patch.length === 0) {
      return;
    }
    this.done.push(this.patch);
    this.patch = [];
  }

  /**
   * Commits any open patch, then returns the latest patch in reverse order.
   * The caller replays each event's inverse, in the order given.
   */
  public undo(): Event[] | undefined {
    this.commit();
    const patch = this.done.pop();
    if (patch === undefined) {
      return undefined;
    }
    const reversed = [...patch].reverse();
    this.undone.push(reversed);
    return reversed;
  }

  /** Returns the last undone patch in forward order, for replay through `execute`. */
  public redo(): Event[] | undefined {
    const reversed = this.undone.pop();
    if (reversed === undefined) {
      return undefined;
    }
    const patch = [...reversed].reverse();
    this.done.push(patch);
    return patch;
  }

  public clear(): void {
    this.patch = [];
    this.done.length = 0;
    this.undone = [];
  }
}
