import { errorMessage } from '../errors';
import { words } from '../text';
import type { BusinessRecord, CitationResult, ResearchResult, SummaryResult } from '../types';

import { agentLogger, type AgentContext } from './context';
import { directoryName } from './directory';

const LISTED_MISSING = 3;

export type SummaryFacts = {
  businessName: string;
  directoriesChecked: number;
  missingDirectories: string[];
  selectedDirectories: string[];
};

export function fillerSentence(businessName: string): string {
  return `Maintaining consistent NAP information across business directories is crucial for local SEO and helps potential customers find accurate information about ${businessName}.`;
}

export function renderSummary(facts: SummaryFacts): string {
  const { businessName, directoriesChecked, missingDirectories, selectedDirectories } = facts;

  let summary = `Research Summary for ${businessName}\n\n`;
  summary +=
    "The research process began by extracting the business's Name, Address, and Phone (NAP) information from its map listing. ";
  summary += `This data was then used to search across ${directoriesChecked} business directories to determine where the business already has listings. `;

  if (missingDirectories.length > 0) {
    const named = missingDirectories.slice(0, LISTED_MISSING).map(directoryName).join(', ');
    summary += `The research found that ${businessName} is missing from ${missingDirectories.length} directories including ${named}`;
    if (missingDirectories.length > LISTED_MISSING) {
      summary += ` and ${missingDirectories.length - LISTED_MISSING} others`;
    }
    summary += '. ';
  } else {
    summary += `Interestingly, ${businessName} appears to be present in all checked directories. `;
  }

  if (selectedDirectories.length > 0) {
    summary += `Based on the findings, NAP citations were prepared for ${selectedDirectories.map(directoryName).join(', ')} `;
    summary += `as these directories would provide valuable additional visibility for ${businessName}. `;
  } else {
    summary +=
      'No directories were selected for citation building as the business appears to be well-represented across the checked platforms. ';
  }

  summary +=
    "The final citations were formatted according to each directory's specific requirements to ensure accuracy and consistency of the business information across the web.";

  return summary;
}

/**
 * Pads a short summary with one filler sentence, or cuts a long one to
 * exactly `max` words. The cut can land mid-sentence.
 */
export function fitWordCount(
  summary: string,
  businessName: string,
  bounds: { min: number; max: number }
): string {
  const tokens = words(summary);
  if (tokens.length < bounds.min) {
    return `${summary} ${fillerSentence(businessName)}`;
  }
  if (tokens.length > bounds.max) {
    return tokens.slice(0, bounds.max).join(' ');
  }
  return summary;
}

export async function runSummaryAgent(
  business: BusinessRecord,
  research: ResearchResult,
  citations: CitationResult,
  ctx: AgentContext
): Promise<SummaryResult> {
  const agent = agentLogger(ctx, 'SummaryAgent');
  agent.start('Generating research summary');

  try {
    if (!research.success) throw new Error(`Research results unavailable: ${research.error}`);
    if (!citations.success) throw new Error(`Citation results unavailable: ${citations.error}`);

    const businessName = business.name || 'Unknown business';
    const rendered = renderSummary({
      businessName,
      directoriesChecked: Object.keys(research.directoriesChecked).length,
      missingDirectories: research.missingDirectories,
      selectedDirectories: research.selectedDirectories,
    });
    const summary = fitWordCount(rendered, businessName, ctx.config.summaryWordCount);
    const wordCount = words(summary).length;

    agent.complete(`Generated summary with ${wordCount} words`);
    return { success: true, summary, wordCount };
  } catch (e) {
    const error = errorMessage(e);
    agent.error(error);
    return { success: false, error };
  }
}
