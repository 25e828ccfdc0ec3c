import { debug } from '../debug.js';
import { errorMessage } from '../errors.js';
import { parseGroupRef, splitTokens, type SplitTokens } from './tokens.js';
import type { GroupDirectory, GroupResolution, ResolvedTrustSet } from './types.js';

/**
 * Turns raw trust-list tokens into a concrete address set.
 *
 * Best-effort: malformed tokens are dropped and a group the directory cannot
 * resolve contributes no members. Nothing here throws because of bad input
 * or a directory outage.
 */
export class TrustListResolver {
  constructor(private directory: GroupDirectory | null) {}

  split(rawTokens: readonly string[]): SplitTokens {
    return splitTokens(rawTokens);
  }

  async resolve(groupTokens: readonly string[]): Promise<GroupResolution[]> {
    const results: GroupResolution[] = [];
    for (const token of groupTokens) {
      const ref = parseGroupRef(token);
      if (!ref) {
        debug('trust', `Skipping malformed group token "${token}"`);
        results.push({ token, ref: null, members: [] });
        continue;
      }
      if (!this.directory) {
        results.push({ token, ref, members: [], error: 'No group directory configured' });
        continue;
      }
      try {
        const members = await this.directory.expand(ref);
        debug('trust', `Group "${token}" resolved to ${members.length} member(s)`);
        results.push({ token, ref, members });
      } catch (err) {
        const message = errorMessage(err);
        console.warn(`[trust] Could not resolve ${token}: ${message}`);
        results.push({ token, ref, members: [], error: message });
      }
    }
    return results;
  }

  buildTrustSet(literalTokens: readonly string[], groups: readonly GroupResolution[]): ResolvedTrustSet {
    const provenance = new Map<string, string[]>();
    const add = (address: string, source: string) => {
      const normalized = address.trim().toLowerCase();
      if (!normalized) return;
      const sources = provenance.get(normalized);
      if (!sources) provenance.set(normalized, [source]);
      else if (!sources.includes(source)) sources.push(source);
    };

    for (const literal of literalTokens) add(literal, 'explicit');
    for (const group of groups) {
      for (const member of group.members) add(member, group.token);
    }

    return {
      addresses: new Set(provenance.keys()),
      provenance,
      groups: [...groups],
      configured: literalTokens.length > 0 || groups.length > 0,
    };
  }

  /** split → resolve → buildTrustSet */
  async resolveTrustSet(rawTokens: readonly string[]): Promise<ResolvedTrustSet> {
    const { literalTokens, groupTokens } = this.split(rawTokens);
    const groups = await this.resolve(groupTokens);
    return this.buildTrustSet(literalTokens, groups);
  }
}
