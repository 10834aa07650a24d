import type { ReportRequestPayload, SessionResult } from '../../../shared/types.js';
import { AgentController, type ControllerLimits, type RunOptions } from '../orchestrator/index.js';
import { AzureReasoningModel, type ReasoningModel } from '../orchestrator/reasoningModel.js';
import type { AnalyticStore } from '../store/analyticStore.js';
import { HybridRetrievalTool } from '../tools/hybridRetrieval.js';
import { createToolRegistry } from '../tools/index.js';
import { StructuredQueryTool } from '../tools/structuredQuery.js';
import { createSearchProvider, type SearchProvider } from '../tools/webSearch.js';
import { AzureEmbeddingClient, type EmbeddingClient } from '../utils/embeddings.js';
import { moduleLogger } from '../utils/logger.js';

const log = moduleLogger('report-service');

export const DEFAULT_MONITORING_QUESTION = [
  'Produce the SRAG monitoring report for the most recent period in the data.',
  'Compute the case growth rate (last 30 days against the 30 days before), the mortality rate among cases with a known outcome,',
  'the ICU occupancy rate (share of cases admitted to intensive care) and the vaccination rate (share of cases vaccinated against COVID-19),',
  'and contextualize them with recent news about SRAG, respiratory viruses, hospital capacity and vaccination in Brazil.'
].join(' ');

export interface ReportService {
  createReport(payload: ReportRequestPayload, options?: RunOptions): Promise<SessionResult>;
}

export class SurveillanceReportService implements ReportService {
  private readonly controller: AgentController;

  constructor(controller: AgentController) {
    this.controller = controller;
  }

  async createReport(payload: ReportRequestPayload, options: RunOptions = {}): Promise<SessionResult> {
    const question = payload.question?.trim() || DEFAULT_MONITORING_QUESTION;
    const result = await this.controller.run(
      {
        question,
        ...(payload.sessionId ? { sessionId: payload.sessionId } : {}),
        ...(payload.locale ? { locale: payload.locale } : {})
      },
      options
    );
    log.info({ sessionId: result.sessionId, status: result.status, iterations: result.iterations }, 'report session completed');
    return result;
  }
}

export interface ReportServiceOverrides {
  model?: ReasoningModel;
  search?: SearchProvider;
  embeddings?: EmbeddingClient;
  limits?: Partial<ControllerLimits>;
}

/** Wires the production clients around an opened store. */
export function createReportService(store: AnalyticStore, overrides: ReportServiceOverrides = {}): SurveillanceReportService {
  const model = overrides.model ?? new AzureReasoningModel();
  const registry = createToolRegistry({
    structuredQuery: new StructuredQueryTool(store, model),
    newsRetrieval: new HybridRetrievalTool(
      overrides.search ?? createSearchProvider(),
      overrides.embeddings ?? new AzureEmbeddingClient()
    )
  });
  return new SurveillanceReportService(new AgentController({ model, registry, store }, overrides.limits));
}
