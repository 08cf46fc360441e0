import { errorMessage } from '../errors';
import { ADDRESS_PENDING, PHONE_PENDING, formatPhoneNumber, isPlaceholder } from '../text';
import type { BusinessRecord, CitationResult } from '../types';

import { agentLogger, type AgentContext } from './context';
import { getDirectoryProfile } from './directory';

/**
 * Formats one citation per selected directory. Unknown directories get the
 * generic template; an empty selection is an empty, successful result.
 */
export async function runCitationBuilderAgent(
  business: BusinessRecord,
  selectedDirectories: string[],
  ctx: AgentContext
): Promise<CitationResult> {
  const agent = agentLogger(ctx, 'CitationBuilderAgent');
  agent.start('Building citations');

  try {
    if (!business.name.trim()) {
      throw new Error('Missing business name');
    }

    if (selectedDirectories.length === 0) {
      agent.log.warn('No directories selected for citation building');
      return { success: true, citations: {} };
    }

    const name = business.name;
    const address = business.address.trim() ? business.address : ADDRESS_PENDING;
    let phone = business.phone.trim() ? business.phone : PHONE_PENDING;
    if (!isPlaceholder(phone)) phone = formatPhoneNumber(phone);

    const citations = Object.fromEntries(
      selectedDirectories.map((id): [string, string] => [
        id,
        getDirectoryProfile(id).formatCitation({ name, address, phone }),
      ])
    );

    agent.complete(`Created ${Object.keys(citations).length} citations`);
    return { success: true, citations };
  } catch (e) {
    const error = errorMessage(e);
    agent.error(error);
    return { success: false, error };
  }
}
