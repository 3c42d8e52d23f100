/**
 * Reduces hostnames to their registrable root (eTLD+1) so that subdomains of the
 * same site compare equal:
 *   exhibitors.bauma.de  → bauma.de
 *   shop.example.co.uk   → example.co.uk
 *   192.168.0.1          → 192.168.0.1
 */

import { MissingSuffixDataError } from './errors';
import type { SuffixTable } from './public-suffix';
import type { Domain } from './types';

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

function cleanHost(host: string): string {
  let h = host.trim().toLowerCase();
  if (h.endsWith('.')) h = h.slice(0, -1);
  if (h.startsWith('[') && h.endsWith(']')) h = h.slice(1, -1);
  return h;
}

function isIpAddress(host: string): boolean {
  return IPV4.test(host) || host.includes(':');
}

/** Last two labels; used when no suffix rule matches. */
function twoLabelRoot(labels: string[]): string {
  return labels.slice(-2).join('.');
}

export class DomainNormalizer {
  private readonly table: SuffixTable;

  constructor(table: SuffixTable | null | undefined) {
    if (!table) {
      throw new MissingSuffixDataError('Domain normalizer requires a public suffix table');
    }
    this.table = table;
  }

  get suffixSource(): string {
    return this.table.name;
  }

  normalize(host: string): Domain {
    const fullHost = cleanHost(host);
    if (!fullHost) return { fullHost: '', registrableRoot: '' };

    const labels = fullHost.split('.');
    if (labels.length === 1 || isIpAddress(fullHost)) {
      return { fullHost, registrableRoot: fullHost };
    }

    const suffix = this.table.publicSuffix(fullHost);
    if (!suffix || (suffix !== fullHost && !fullHost.endsWith('.' + suffix))) {
      return { fullHost, registrableRoot: twoLabelRoot(labels) };
    }
    if (suffix === fullHost) {
      return { fullHost, registrableRoot: fullHost };
    }

    const suffixLabels = suffix.split('.').length;
    return { fullHost, registrableRoot: labels.slice(-(suffixLabels + 1)).join('.') };
  }

  /** Same site iff both hosts have the same non-empty registrable root. */
  isSameSite(a: string, b: string): boolean {
    const rootA = this.normalize(a).registrableRoot;
    return rootA !== '' && rootA === this.normalize(b).registrableRoot;
  }
}
