import { IndexOutOfRangeError } from "../../shared/errors.js";
import type { Track } from "../../shared/types.js";

/**
 * Ordered track list with a current-index cursor. Holds no lock of its own;
 * the playback controller is its only writer.
 */
export class PlaylistManager {
  private items: Track[] = [];
  private currentIndex = -1;

  public get length(): number {
    return this.items.length;
  }

  public getItems(): readonly Track[] {
    return this.items;
  }

  public getItem(index: number): Track | null {
    return this.items[index] ?? null;
  }

  public getCurrentIndex(): number {
    return this.currentIndex;
  }

  public isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  public setCurrentIndex(index: number): void {
    if (index !== -1 && !this.isValidIndex(index)) {
      throw new IndexOutOfRangeError(index, this.items.length);
    }
    this.currentIndex = index;
  }

  public append(track: Track): number {
    this.items.push(track);
    return this.items.length - 1;
  }

  /**
   * Removes one entry. The caller stops playback first when the entry is the
   * current one; this only keeps the cursor on the same logical track.
   */
  public removeAt(index: number): Track {
    if (!this.isValidIndex(index)) {
      throw new IndexOutOfRangeError(index, this.items.length);
    }

    const [removed] = this.items.splice(index, 1);
    if (!removed) {
      throw new IndexOutOfRangeError(index, this.items.length + 1);
    }

    if (index === this.currentIndex) {
      this.currentIndex = -1;
    } else if (index < this.currentIndex) {
      this.currentIndex -= 1;
    }

    return removed;
  }

  public clear(): void {
    this.items = [];
    this.currentIndex = -1;
  }
}
