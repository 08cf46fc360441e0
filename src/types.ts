export type BusinessRecord = {
  name: string;
  address: string;
  phone: string;
  sourceUrl: string;
};

export type StageFailure = { success: false; error: string };

export type ExtractionResult = {
  success: boolean;
  partialSuccess: boolean;
  name: string | null;
  address: string | null;
  phone: string | null;
  sourceUrl: string;
  error?: string;
};

export type DirectoryCheck = {
  url: string;
  exists: boolean;
  error?: string;
};

export type ResearchResult =
  | {
      success: true;
      directoriesChecked: Record<string, DirectoryCheck>;
      missingDirectories: string[];
      selectedDirectories: string[];
    }
  | StageFailure;

export type CitationResult = { success: true; citations: Record<string, string> } | StageFailure;

export type SummaryResult = { success: true; summary: string; wordCount: number } | StageFailure;

export type WorkflowStage =
  | 'validation'
  | 'extraction'
  | 'research'
  | 'citation_building'
  | 'summary'
  | 'output';

export type WorkflowFailure = {
  success: false;
  stage: WorkflowStage;
  error: string;
};

export type WorkflowSuccess = {
  success: true;
  businessName: string;
  business: BusinessRecord;
  directoriesChecked: Record<string, DirectoryCheck>;
  missingDirectories: string[];
  selectedDirectories: string[];
  citations: Record<string, string>;
  summary: string;
  summaryWordCount: number;
  stats: {
    directoriesChecked: number;
    directoriesMissing: number;
    citationsCreated: number;
  };
  outputFile: string;
  content: string;
};

export type WorkflowResult = WorkflowSuccess | WorkflowFailure;

export type StatusListener = (stage: WorkflowStage, message: string, percent: number) => void;
