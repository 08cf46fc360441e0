import { agentLogger, type AgentContext } from './agents/context';
import { runCitationBuilderAgent } from './agents/citationBuilderAgent';
import { runExtractorAgent } from './agents/extractorAgent';
import { runResearcherAgent } from './agents/researcherAgent';
import { runSummaryAgent } from './agents/summaryAgent';
import { errorMessage } from './errors';
import { buildReport, generateOutputFilename, saveTextFile } from './reports';
import { ADDRESS_PLACEHOLDER, PHONE_PLACEHOLDER, cleanString, formatPhoneNumber } from './text';
import type {
  BusinessRecord,
  ExtractionResult,
  StatusListener,
  WorkflowFailure,
  WorkflowResult,
  WorkflowStage,
} from './types';

export const MISSING_NAME_ERROR = 'Missing business name: the listing did not yield a name, which is required';

/** Fills absent address/phone with placeholders so later stages never see empty fields. */
export function toBusinessRecord(extraction: ExtractionResult & { name: string }): BusinessRecord {
  const address = cleanString(extraction.address);
  const phone = cleanString(extraction.phone);
  return {
    name: extraction.name.trim(),
    address: address || ADDRESS_PLACEHOLDER,
    phone: phone ? formatPhoneNumber(phone) : PHONE_PLACEHOLDER,
    sourceUrl: extraction.sourceUrl,
  };
}

function hasName(extraction: ExtractionResult): extraction is ExtractionResult & { name: string } {
  return typeof extraction.name === 'string' && extraction.name.trim() !== '';
}

/**
 * Runs validation -> extraction -> research -> citation_building -> summary ->
 * output. The first failing stage ends the run; nothing is retried.
 */
export async function runWorkflow(
  listingUrl: string,
  ctx: AgentContext,
  onStatus: StatusListener = () => {}
): Promise<WorkflowResult> {
  const agent = agentLogger(ctx, 'Workflow');
  agent.log.info(`Starting workflow for URL: ${listingUrl}`);

  const fail = (stage: WorkflowStage, error: string): WorkflowFailure => {
    agent.log.error({ stage }, error);
    onStatus(stage, `Failed: ${error}`, 100);
    return { success: false, stage, error };
  };

  const url = listingUrl.trim();
  if (!url) {
    return fail('validation', 'Map listing URL cannot be empty');
  }

  onStatus('validation', 'Starting workflow...', 5);

  // Step 1: extract NAP from the listing
  onStatus('extraction', 'Extracting business information from the map listing...', 5);
  const extraction = await runExtractorAgent(url, ctx);
  onStatus('extraction', 'Extraction finished', 20);

  if (!extraction.success && !extraction.partialSuccess) {
    return fail('extraction', extraction.error ?? 'Failed to extract required information');
  }
  if (!hasName(extraction)) {
    return fail('extraction', MISSING_NAME_ERROR);
  }

  const business = toBusinessRecord(extraction);
  agent.log.info(`Extracted business: ${business.name}`);

  // Step 2: directory presence
  onStatus('research', `Researching ${business.name} across business directories...`, 20);
  const research = await runResearcherAgent(business, ctx);
  onStatus('research', 'Research finished', 50);

  if (!research.success) {
    return fail('research', research.error || 'Research failed');
  }
  agent.log.info(`Found ${research.missingDirectories.length} missing directories`);

  // Step 3: citations for the sampled directories
  onStatus('citation_building', 'Building citations for missing directories...', 50);
  const citations = await runCitationBuilderAgent(business, research.selectedDirectories, ctx);
  onStatus('citation_building', 'Citations built', 75);

  if (!citations.success) {
    return fail('citation_building', citations.error || 'Citation building failed');
  }

  // Step 4: summary
  onStatus('summary', 'Generating summary report...', 75);
  const summary = await runSummaryAgent(business, research, citations, ctx);
  onStatus('summary', 'Summary generated', 90);

  if (!summary.success) {
    return fail('summary', summary.error || 'Summary generation failed');
  }

  // Step 5: persist the report
  try {
    onStatus('output', 'Creating final report...', 90);
    const generatedAt = ctx.now();
    const content = buildReport({
      business,
      summary: summary.summary,
      citations: citations.citations,
      generatedAt,
    });
    const outputFile = await saveTextFile(
      content,
      generateOutputFilename(business.name, generatedAt),
      ctx.config.outputDirectory
    );
    agent.log.info(`Saved output to ${outputFile}`);
    onStatus('output', 'Process completed successfully!', 100);

    return {
      success: true,
      businessName: business.name,
      business,
      directoriesChecked: research.directoriesChecked,
      missingDirectories: research.missingDirectories,
      selectedDirectories: research.selectedDirectories,
      citations: citations.citations,
      summary: summary.summary,
      summaryWordCount: summary.wordCount,
      stats: {
        directoriesChecked: Object.keys(research.directoriesChecked).length,
        directoriesMissing: research.missingDirectories.length,
        citationsCreated: Object.keys(citations.citations).length,
      },
      outputFile,
      content,
    };
  } catch (e) {
    return fail('output', `Output generation failed: ${errorMessage(e)}`);
  }
}
