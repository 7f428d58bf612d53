/**
 * Mock Port Enumeration for Testing
 * SOLID: Liskov Substitution - can replace the host enumerator in tests
 */

import type { PortDescriptor, PortEnumerator } from "./interface";
import { EnumerationError } from "../errors";

export interface MockEnumeratorState {
  ports?: PortDescriptor[];
  failure?: unknown;
}

export class MockEnumerator implements PortEnumerator {
  private state: MockEnumeratorState;
  public listPortsCalls = 0;

  constructor(state: MockEnumeratorState = {}) {
    this.state = state;
  }

  async listPorts(): Promise<PortDescriptor[]> {
    this.listPortsCalls++;

    if (this.state.failure !== undefined) {
      throw new EnumerationError(this.state.failure);
    }

    return [...(this.state.ports ?? [])];
  }

  // Helper to update mock state during test
  setState(state: Partial<MockEnumeratorState>): void {
    this.state = { ...this.state, ...state };
  }

  reset(): void {
    this.listPortsCalls = 0;
  }
}
