import { AlertAggregator } from "./alertAggregator";
import { issueStepUpChallenge } from "./challenge";
import { SignalEnrichmentResolver } from "./enrichment";
import { ENV, PipelineConfig } from "./env";
import { errorMessage } from "./errors";
import { EnforcementGateway } from "./gateway";
import { Telemetry, cloudWatchTelemetry } from "./metrics";
import { ReferenceDataRegistry, ReferenceDataSnapshot, loadReferenceData } from "./referenceData";
import { AlertStore, DecisionStore, dynamoAlertStore, dynamoDecisionStore } from "./store";
import { TrustScorer } from "./trustScorer";
import { SignalValidator } from "./validator";

export interface PipelineDependencies {
  alerts: AlertStore;
  decisions: DecisionStore;
  telemetry?: Telemetry;
  clock?: () => Date;
}

export interface Pipeline {
  gateway: EnforcementGateway;
  aggregator: AlertAggregator;
  registry: ReferenceDataRegistry;
  alerts: AlertStore;
  telemetry?: Telemetry;
}

export function createPipeline(config: PipelineConfig, registry: ReferenceDataRegistry, deps: PipelineDependencies): Pipeline {
  const clock = deps.clock ?? (() => new Date());
  const aggregator = new AlertAggregator(deps.alerts, clock);
  const secret = config.stepUpSecret;

  const gateway = new EnforcementGateway(
    {
      resolver: new SignalEnrichmentResolver(registry, { distanceThresholdKm: config.crossCheckDistanceKm }),
      validator: new SignalValidator(config.validation, clock),
      aggregator,
      scorer: new TrustScorer(config.scoring),
      decisions: deps.decisions,
      alerts: deps.alerts,
      telemetry: deps.telemetry,
      issueChallenge: secret ? (sessionId, risk) => issueStepUpChallenge(secret, sessionId, risk) : undefined,
      clock
    },
    {
      alertWindowMinutes: config.alertWindowMinutes,
      alertThreshold: config.alertThreshold,
      highSeverityThreshold: config.highSeverityThreshold,
      dependencyTimeoutMs: config.dependencyTimeoutMs,
      telemetryTimeoutMs: config.telemetryTimeoutMs
    }
  );

  return { gateway, aggregator, registry, alerts: deps.alerts, telemetry: deps.telemetry };
}

function loadSnapshot(): Promise<ReferenceDataSnapshot> {
  return ENV.referenceDataDir ? loadReferenceData(ENV.referenceDataDir) : Promise.resolve(ReferenceDataSnapshot.empty());
}

let current: Promise<Pipeline> | undefined;

/**
 * Built once per Lambda container; a failed build is retried on the next call.
 * Reference data that cannot be loaded leaves the registry unavailable, so
 * decisions fail safe until the scheduled reload succeeds.
 */
export function getPipeline(): Promise<Pipeline> {
  if (!current) {
    current = loadSnapshot()
      .then(
        (snapshot) => new ReferenceDataRegistry(snapshot, loadSnapshot),
        (error: unknown) => {
          console.error("reference_data_load_error", { error: errorMessage(error) });
          return ReferenceDataRegistry.unavailable(error, loadSnapshot);
        }
      )
      .then((registry) =>
        createPipeline(ENV, registry, {
          alerts: dynamoAlertStore,
          decisions: dynamoDecisionStore,
          telemetry: cloudWatchTelemetry
        })
      )
      .catch((error: unknown) => {
        current = undefined;
        throw error;
      });
  }
  return current;
}
