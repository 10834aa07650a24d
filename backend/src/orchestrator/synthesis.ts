import { z } from 'zod';
import type {
  CompleteReport,
  DegradedReport,
  MetricName,
  Observation,
  ReportClaim,
  ReportMetric,
  SessionReport,
  StructuredReport
} from '../../../shared/types.js';
import { config } from '../config/app.js';
import { QUERY_TOOL, NEWS_TOOL } from '../tools/index.js';
import { SynthesisError } from '../utils/errors.js';
import { moduleLogger } from '../utils/logger.js';
import { parseJsonObject } from '../utils/openai.js';
import { withTimeout } from '../utils/resilience.js';
import { budgetSections } from './contextBudget.js';
import type { ReasoningModel } from './reasoningModel.js';
import { ReportSchema } from './schemas.js';
import { renderObservation, type SessionFacts } from './session.js';

const log = moduleLogger('synthesis');

export const METRIC_NAMES: readonly MetricName[] = [
  'case_growth_rate',
  'mortality_rate',
  'icu_occupancy_rate',
  'vaccination_rate'
];

const DECLARED_SOURCES: ReadonlySet<string> = new Set([QUERY_TOOL, NEWS_TOOL]);

export const INCOMPLETE_NOTICE = 'Data may be incomplete.';

const reportSchema = z.object({
  title: z.string().min(1),
  executiveSummary: z.string(),
  situation: z.object({
    trend: z.enum(['rising', 'falling', 'stable', 'unknown']),
    explanation: z.string()
  }),
  metrics: z.array(
    z.object({
      name: z.enum(['case_growth_rate', 'mortality_rate', 'icu_occupancy_rate', 'vaccination_rate']),
      value: z.string().nullable(),
      citations: z.array(z.string())
    })
  ),
  recentContext: z.string(),
  interpretation: z.string(),
  limitations: z.string(),
  recommendations: z.string(),
  claims: z.array(
    z.object({
      statement: z.string(),
      figures: z.array(z.string()),
      citations: z.array(z.string())
    })
  )
});

export interface SynthesisInput {
  facts: SessionFacts;
  draft: string | null;
  observations: readonly Observation[];
  iterationLimitReached: boolean;
}

/** Ids that may be cited: successful observations of declared tools. */
export function citableIds(observations: readonly Observation[]): Set<string> {
  return new Set(observations.filter((obs) => obs.ok && DECLARED_SOURCES.has(obs.source)).map((obs) => obs.id));
}

function completenessNotices(observations: readonly Observation[], iterationLimitReached: boolean): string[] {
  const notices: string[] = [];
  if (iterationLimitReached) {
    notices.push(`Iteration limit reached before the agent finished gathering evidence. ${INCOMPLETE_NOTICE}`);
  }
  const failed = observations.filter((obs) => !obs.ok && DECLARED_SOURCES.has(obs.source)).length;
  if (failed > 0) {
    notices.push(`${failed} tool call${failed === 1 ? '' : 's'} failed. ${INCOMPLETE_NOTICE}`);
  }
  return notices;
}

export function degradedReport(rawText: string, input: Omit<SynthesisInput, 'facts' | 'draft'>, reason: string): DegradedReport {
  return {
    status: 'degraded',
    completeness: 'partial',
    notices: [
      ...completenessNotices(input.observations, input.iterationLimitReached),
      `${reason} The raw answer and the full evidence trail are attached. ${INCOMPLETE_NOTICE}`
    ],
    rawText,
    trail: [...input.observations]
  };
}

/**
 * Validates synthesized output and enforces citation integrity. Citations not
 * backed by a successful observation are dropped; claims left without any are
 * flagged unsupported and metric values without any become unavailable.
 */
export function finalizeReport(rawText: string, input: Omit<SynthesisInput, 'facts' | 'draft'>): SessionReport {
  const candidate = parseJsonObject(rawText);
  const parsed = candidate ? reportSchema.safeParse(candidate) : null;
  if (!parsed || !parsed.success) {
    const failure = new SynthesisError('The report could not be structured.', rawText);
    log.warn({ err: failure, issues: parsed && !parsed.success ? parsed.error.issues.length : 'not json' }, 'synthesized report is malformed');
    return degradedReport(failure.rawText, input, failure.message);
  }
  const data = parsed.data;

  const valid = citableIds(input.observations);
  const dropped = new Set<string>();
  const keep = (citations: string[]) =>
    Array.from(new Set(citations)).filter((id) => {
      if (valid.has(id)) {
        return true;
      }
      dropped.add(id);
      return false;
    });

  const metrics: ReportMetric[] = METRIC_NAMES.map((name) => {
    const metric = data.metrics.find((entry) => entry.name === name);
    if (!metric) {
      return { name, value: null, citations: [] };
    }
    const citations = keep(metric.citations);
    return { name, value: citations.length > 0 ? metric.value : null, citations };
  });

  const claims: ReportClaim[] = data.claims.map((claim) => {
    const citations = keep(claim.citations);
    return { statement: claim.statement, figures: claim.figures, citations, supported: citations.length > 0 };
  });

  const report: StructuredReport = { ...data, metrics, claims };
  const notices = completenessNotices(input.observations, input.iterationLimitReached);

  const result: CompleteReport = {
    status: 'complete',
    completeness: notices.length > 0 ? 'partial' : 'complete',
    notices,
    report,
    markdown: renderReportMarkdown(report, notices),
    droppedCitations: Array.from(dropped)
  };
  return result;
}

const metricLabels: Record<MetricName, string> = {
  case_growth_rate: 'Taxa de aumento de casos',
  mortality_rate: 'Taxa de mortalidade',
  icu_occupancy_rate: 'Taxa de ocupação de UTI',
  vaccination_rate: 'Taxa de vacinação'
};

const trendLabels: Record<StructuredReport['situation']['trend'], string> = {
  rising: 'Alta',
  falling: 'Queda',
  stable: 'Estabilidade',
  unknown: 'Indeterminada'
};

function cite(citations: string[]): string {
  return citations.length > 0 ? ` [${citations.join(', ')}]` : '';
}

export function renderReportMarkdown(report: StructuredReport, notices: string[] = []): string {
  const lines: string[] = [`## ${report.title}`, ''];

  if (notices.length > 0) {
    lines.push(...notices.map((notice) => `> ${notice}`), '');
  }

  lines.push('### Resumo Executivo', report.executiveSummary, '');
  lines.push('### Situação Atual e Tendência', `**Tendência:** ${trendLabels[report.situation.trend]}`, '', report.situation.explanation, '');
  lines.push('### Métricas Principais');
  for (const metric of report.metrics) {
    lines.push(`- ${metricLabels[metric.name]}: ${metric.value ?? 'não disponível'}${cite(metric.citations)}`);
  }
  lines.push('');
  lines.push('### Contexto Recente (Notícias)', report.recentContext, '');
  lines.push('### Interpretação Integrada', report.interpretation, '');
  lines.push('### Incertezas e Limitações', report.limitations, '');
  lines.push('### Conclusão e Recomendações', report.recommendations);

  const unsupported = report.claims.filter((claim) => !claim.supported);
  if (unsupported.length > 0) {
    lines.push('', '### Afirmações sem evidência', ...unsupported.map((claim) => `- ${claim.statement}`));
  }

  return lines.join('\n');
}

function synthesisPrompt(facts: SessionFacts): string {
  return [
    'You are a public-health surveillance specialist writing an official SRAG monitoring report.',
    `Write in ${facts.locale}. The reference date of the data is ${facts.dataDate ?? 'unknown'}; relative periods are relative to it.`,
    'Use only the evidence provided. Each evidence entry has an id such as obs-2.',
    'Every metric value and every claim must cite the ids of the evidence it comes from. If a metric cannot be computed from the evidence, set its value to null.',
    'Metrics: case_growth_rate, mortality_rate, icu_occupancy_rate, vaccination_rate.',
    'Keep a technical, objective tone like an official epidemiological bulletin. Mention underreporting and reporting delays among the limitations where relevant.'
  ].join('\n');
}

export interface SynthesizerOptions {
  timeoutMs?: number;
  evidenceMaxTokens?: number;
  observationMaxTokens?: number;
}

export class ReportSynthesizer {
  private readonly model: ReasoningModel;
  private readonly timeoutMs: number;
  private readonly evidenceMaxTokens: number;
  private readonly observationMaxTokens: number;

  constructor(model: ReasoningModel, options: SynthesizerOptions = {}) {
    this.model = model;
    this.timeoutMs = options.timeoutMs ?? config.MODEL_TIMEOUT_MS;
    this.observationMaxTokens = options.observationMaxTokens ?? config.OBSERVATION_MAX_TOKENS;
    this.evidenceMaxTokens = options.evidenceMaxTokens ?? this.observationMaxTokens * 8;
  }

  /** Provider and timeout failures propagate; malformed output degrades. */
  async synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<SessionReport> {
    const evidence = input.observations
      .filter((obs) => DECLARED_SOURCES.has(obs.source))
      .map((obs) => renderObservation(obs, this.observationMaxTokens))
      .join('\n');
    const { evidence: packed } = budgetSections({
      sections: { evidence },
      caps: { evidence: this.evidenceMaxTokens }
    });

    const user = [
      `Question: ${input.facts.question}`,
      '',
      'Evidence:',
      packed || '(none)',
      '',
      'Analyst draft:',
      input.draft ?? '(no draft; the analysis stopped before a final answer)'
    ].join('\n');

    const raw = await withTimeout(
      'model.synthesis',
      this.timeoutMs,
      (timeoutSignal) =>
        this.model.generate({ stage: 'synthesis', system: synthesisPrompt(input.facts), user, jsonSchema: ReportSchema }, timeoutSignal),
      signal
    );

    return finalizeReport(raw, input);
  }
}
