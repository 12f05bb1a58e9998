import { SESSION_CONFIG } from '../config/env';
import { normalizeText, pushRecent } from '../utils/text';

/** Server-side recent locations, same rules as the client History Store */
export class LocationsStore {
  private readonly locations = new Map<string, string[]>();

  constructor(private readonly limit: number = SESSION_CONFIG.historyLimit) {}

  list(userId: string): string[] {
    return [...(this.locations.get(userId) || [])];
  }

  add(userId: string, location: string): void {
    const normalized = normalizeText(location);
    if (!normalized) return;
    this.locations.set(userId, pushRecent(this.list(userId), normalized, this.limit));
  }
}
