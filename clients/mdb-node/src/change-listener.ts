/**
 * Notified of every mutating request the client issues
 */
export interface ChangeListener {
  onChange(resId: string | undefined, topic: string | undefined, changes: unknown): void;
  onAdd(resId: string | undefined, topic: string, added: unknown): void;
  onCreate(resId: string | undefined, topic: string, created: unknown): void;
  onDelete(resId: string | undefined): void;
}

export type ChangeType = 'CHANGE' | 'ADD' | 'CREATE' | 'DELETE';

export class VoidChangeListener implements ChangeListener {
  onChange(): void {}
  onAdd(): void {}
  onCreate(): void {}
  onDelete(): void {}
}

export class Change {
  constructor(
    readonly resId: string | undefined,
    readonly type: ChangeType,
    readonly topic?: string,
    readonly payload?: unknown
  ) {}

  toString(): string {
    const topic = this.topic ? ` ${this.topic}` : '';
    const payload = this.payload === undefined ? '' : ` ${JSON.stringify(this.payload)}`;
    return `${this.type}${topic} ${this.resId ?? ''}${payload}`;
  }
}

/**
 * Keeps every change in memory, in order
 */
export class RecordingChangeListener implements ChangeListener {
  private changes: Change[] = [];

  /**
   * Clear the recorded changes, returning what was recorded before clearing
   */
  popChanges(): Change[] {
    const recorded = this.changes;
    this.changes = [];
    return recorded;
  }

  onChange(resId: string | undefined, topic: string | undefined, changes: unknown): void {
    this.changes.push(new Change(resId, 'CHANGE', topic, changes));
  }

  onAdd(resId: string | undefined, topic: string, added: unknown): void {
    this.changes.push(new Change(resId, 'ADD', topic, added));
  }

  onCreate(resId: string | undefined, topic: string, created: unknown): void {
    this.changes.push(new Change(resId, 'CREATE', topic, created));
  }

  onDelete(resId: string | undefined): void {
    this.changes.push(new Change(resId, 'DELETE'));
  }
}
