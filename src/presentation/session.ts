import { InvalidInputError, NotFoundError } from '../types.js';

/**
 * Name → presentation id table for one server instance. Tools address
 * presentations by the name they were created with.
 */
export class PresentationSession {
  private readonly presentations = new Map<string, string>();

  register(name: string, presentationId: string): void {
    this.assertAvailable(name);
    this.presentations.set(name, presentationId);
  }

  /** Throws when `name` is already taken, so callers can check before creating anything remotely. */
  assertAvailable(name: string): void {
    if (this.presentations.has(name)) {
      throw new InvalidInputError(`Presentation '${name}' already exists in this session`);
    }
  }

  resolve(name: string): string {
    const presentationId = this.presentations.get(name);
    if (presentationId === undefined) {
      throw new NotFoundError(`Presentation '${name}' not found`);
    }
    return presentationId;
  }
}
