import { debug } from '../debug.js';
import { normalizeAddresses, splitAddressList } from '../mail/recipients.js';
import type { SendRequest } from '../mail/types.js';
import type { TrustListResolver } from './resolver.js';
import { isGroupToken } from './tokens.js';
import type { GroupResolution, ResolvedTrustSet, TrustDecision, TrustListStore } from './types.js';

export interface RecipientFields {
  to: readonly string[];
  cc?: readonly string[];
  bcc?: readonly string[];
}

export interface ExpandedRecipients {
  to: string[];
  cc: string[];
  bcc: string[];
  /** Group tokens found among the recipients, with what they expanded to */
  groups: GroupResolution[];
}

export interface GateCheck {
  recipients: ExpandedRecipients;
  trustSet: ResolvedTrustSet;
  decision: TrustDecision;
}

/**
 * Partitions recipients into trusted and untrusted. Everyone is trusted only
 * when no list is configured; a configured list whose groups all failed to
 * resolve trusts nobody.
 */
export class TrustGate {
  constructor(
    private store: TrustListStore,
    private resolver: TrustListResolver,
  ) {}

  evaluate(fields: RecipientFields, trustSet: ResolvedTrustSet): TrustDecision {
    const recipients = normalizeAddresses([...fields.to, ...(fields.cc ?? []), ...(fields.bcc ?? [])]);
    if (!trustSet.configured) {
      return { recipients, trustedRecipients: [...recipients], untrustedRecipients: [] };
    }
    const trustedRecipients: string[] = [];
    const untrustedRecipients: string[] = [];
    for (const r of recipients) {
      if (trustSet.addresses.has(r)) trustedRecipients.push(r);
      else untrustedRecipients.push(r);
    }
    return { recipients, trustedRecipients, untrustedRecipients };
  }

  /**
   * Replace any `group:`/`groupId:` token used as a recipient with the group's
   * members, through the same directory path the trust list uses.
   */
  async expandRecipients(fields: RecipientFields): Promise<ExpandedRecipients> {
    const groups: GroupResolution[] = [];
    const expandField = async (values: readonly string[] | undefined): Promise<string[]> => {
      const out: string[] = [];
      for (const entry of splitAddressList(values ?? [])) {
        if (!isGroupToken(entry)) {
          out.push(entry);
          continue;
        }
        const [resolution] = await this.resolver.resolve([entry]);
        groups.push(resolution);
        out.push(...resolution.members);
      }
      return normalizeAddresses(out);
    };

    return {
      to: await expandField(fields.to),
      cc: await expandField(fields.cc),
      bcc: await expandField(fields.bcc),
      groups,
    };
  }

  /** Load the persisted list, resolve it, expand the request and decide. */
  async check(request: Pick<SendRequest, 'to' | 'cc' | 'bcc'>): Promise<GateCheck> {
    const { tokens } = await this.store.load();
    const trustSet = await this.resolver.resolveTrustSet(tokens);
    const recipients = await this.expandRecipients(request);
    const decision = this.evaluate(recipients, trustSet);
    debug('trust', `${decision.trustedRecipients.length} trusted, ${decision.untrustedRecipients.length} untrusted recipient(s)`);
    return { recipients, trustSet, decision };
  }
}
