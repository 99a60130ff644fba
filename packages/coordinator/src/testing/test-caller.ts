import type { CallerHandle } from "@sensorgate/contracts";

export class TestCallerHandle implements CallerHandle {
  private readonly listeners = new Set<() => void>();
  private gone = false;

  constructor(readonly id: string) {}

  get watchers(): number {
    return this.listeners.size;
  }

  get isGone(): boolean {
    return this.gone;
  }

  onGone(listener: () => void): () => void {
    if (this.gone) {
      throw new Error(`caller ${this.id} is gone`);
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  die(): void {
    if (this.gone) {
      return;
    }
    this.gone = true;
    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }
}
