/**
 * Tracking approval - turn a reviewer's reply on a product proposal into a
 * products.yaml entry.
 *
 * A proposal is a fenced ```json block in the proposal text; the reply is a
 * comment starting with `track` or `ignore`. Everything here is pure; the CLI
 * does the file I/O.
 */

import { z } from 'zod';
import { mpCode, urlSlug } from '../sources/product-key';
import type { ProductsConfig, TrackedProduct } from './config';

export type TrackingDecision = 'track' | 'ignore';

export class ProposalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProposalError';
  }
}

const proposalSchema = z.object({
  site: z.string().min(1),
  url: z.string().min(1),
  name: z.string().min(1),
  current_price: z.number().optional(),
});

export type ProductProposal = z.infer<typeof proposalSchema>;

/**
 * `track` or `ignore` from a reply. Email replies carry quoted text after the
 * command, so a leading command word is enough. Anything else is null.
 */
export function parseDecision(comment: string): TrackingDecision | null {
  const text = comment.trim().toLowerCase();
  if (text === 'track' || text === 'ignore') return text;
  if (text.startsWith('ignore')) return 'ignore';
  if (text.startsWith('track')) return 'track';
  return null;
}

export function parseProposal(body: string): ProductProposal {
  const marker = body.indexOf('```json');
  if (marker === -1) throw new ProposalError("Could not find '```json' marker in proposal");
  const start = marker + '```json'.length;
  const end = body.indexOf('```', start);
  if (end === -1) throw new ProposalError("Could not find closing '```' marker in proposal");

  let raw: unknown;
  try {
    raw = JSON.parse(body.slice(start, end).trim());
  } catch (err) {
    throw new ProposalError(`Proposal JSON is invalid: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = proposalSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProposalError(`Proposal is missing fields: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
  }
  return parsed.data;
}

export function proposedProductId(site: string, url: string): string | undefined {
  if (site === 'bjornborg') return mpCode(url) ?? undefined;
  if (site === 'fitnesstukku') {
    const slug = urlSlug(url).replace(/\.html$/, '');
    return slug === 'unknown' ? undefined : `fitnesstukku_${slug}`;
  }
  return undefined;
}

export function categorize(site: string, name: string): string | undefined {
  const lower = name.toLowerCase();
  if (site === 'bjornborg') {
    if (lower.includes('sock')) return 'socks';
    if (lower.includes('crew') || lower.includes('sweater')) return 'apparel';
    return 'unknown';
  }
  if (site === 'fitnesstukku') {
    if (lower.includes('whey') || lower.includes('protein')) return 'protein';
    if (lower.includes('creatine')) return 'supplements';
    return 'nutrition';
  }
  return undefined;
}

/**
 * New config with the proposal recorded under its site. An existing entry
 * for the same URL is replaced, so a later decision overrides an earlier one.
 */
export function applyTrackingDecision(
  config: ProductsConfig,
  proposal: ProductProposal,
  decision: TrackingDecision
): ProductsConfig {
  const entry: TrackedProduct = {
    name: proposal.name,
    url: proposal.url,
    site: proposal.site,
    status: decision,
  };
  const productId = proposedProductId(proposal.site, proposal.url);
  if (productId) entry.product_id = productId;
  const category = categorize(proposal.site, proposal.name);
  if (category) entry.category = category;

  const existing = config.products[proposal.site] ?? [];
  return {
    ...config,
    products: {
      ...config.products,
      [proposal.site]: [...existing.filter((p) => p.url !== proposal.url), entry],
    },
  };
}
