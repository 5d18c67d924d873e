import { MatchingConfigOverrides } from '../../config/matching';

/** One side of a comparison: either an already-extracted skill list or plain text. */
export interface DocumentInput {
  skills?: unknown;
  text?: string;
}

export interface PairInput {
  resume: DocumentInput;
  /** Either an inline job description or the key of a registered job. */
  jobDescription?: DocumentInput;
  jobKey?: string;
}

export interface MatchRequestDto extends PairInput {
  config?: MatchingConfigOverrides;
  persist?: unknown;
}

export interface BatchPairDto extends PairInput {
  id: string;
}

export interface BatchMatchRequestDto {
  pairs: BatchPairDto[];
  config?: MatchingConfigOverrides;
}
