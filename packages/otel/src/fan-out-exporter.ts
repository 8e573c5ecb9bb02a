import { core, metrics } from "@opentelemetry/sdk-node";

/**
 * Pushes every collection to several exporters, so that one periodic
 * reader can feed both the console and OTLP.
 */
export class FanOutMetricExporter implements metrics.PushMetricExporter {
  private readonly exporters: readonly metrics.PushMetricExporter[];

  constructor(exporters: readonly metrics.PushMetricExporter[]) {
    this.exporters = exporters;
  }

  export(
    resourceMetrics: metrics.ResourceMetrics,
    resultCallback: (result: core.ExportResult) => void,
  ): void {
    if (this.exporters.length === 0) {
      resultCallback({ code: core.ExportResultCode.SUCCESS });
      return;
    }

    let pending = this.exporters.length;
    let failure: core.ExportResult | undefined;
    for (const exporter of this.exporters) {
      exporter.export(resourceMetrics, (result) => {
        if (result.code !== core.ExportResultCode.SUCCESS && !failure) {
          failure = result;
        }
        pending -= 1;
        if (pending === 0) {
          resultCallback(failure ?? { code: core.ExportResultCode.SUCCESS });
        }
      });
    }
  }

  selectAggregationTemporality(
    instrumentType: metrics.InstrumentType,
  ): metrics.AggregationTemporality {
    for (const exporter of this.exporters) {
      if (exporter.selectAggregationTemporality) {
        return exporter.selectAggregationTemporality(instrumentType);
      }
    }
    return metrics.AggregationTemporality.CUMULATIVE;
  }

  async forceFlush(): Promise<void> {
    await Promise.all(this.exporters.map((exporter) => exporter.forceFlush()));
  }

  async shutdown(): Promise<void> {
    await Promise.all(this.exporters.map((exporter) => exporter.shutdown()));
  }
}
