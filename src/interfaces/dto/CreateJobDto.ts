import { MatchingConfigOverrides } from '../../config/matching';
import { DocumentInput } from './MatchRequestDto';

export interface CreateJobDto extends DocumentInput {
  jobKey: string;
  title?: string;
}

export interface RankJobsDto {
  resume: DocumentInput;
  limit?: number;
  config?: MatchingConfigOverrides;
}
