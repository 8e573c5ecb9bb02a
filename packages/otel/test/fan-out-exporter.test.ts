import { describe, expect, test, vi } from "vitest";
import { core, metrics, resources } from "@opentelemetry/sdk-node";
import { FanOutMetricExporter } from "../src/fan-out-exporter.js";

type ExportCallback = (result: core.ExportResult) => void;

function fakeExporter(
  code: core.ExportResultCode = core.ExportResultCode.SUCCESS,
): metrics.PushMetricExporter {
  return {
    export: vi.fn((_metrics: metrics.ResourceMetrics, done: ExportCallback) =>
      done({ code }),
    ),
    forceFlush: vi.fn(async () => {}),
    shutdown: vi.fn(async () => {}),
  };
}

const resourceMetrics: metrics.ResourceMetrics = {
  resource: new resources.Resource({ "service.name": "checkout" }),
  scopeMetrics: [],
};

describe("FanOutMetricExporter", () => {
  test("exports to every exporter and reports success", () => {
    const first = fakeExporter();
    const second = fakeExporter();
    const exporter = new FanOutMetricExporter([first, second]);
    const done = vi.fn();

    exporter.export(resourceMetrics, done);

    expect(first.export).toHaveBeenCalledTimes(1);
    expect(second.export).toHaveBeenCalledTimes(1);
    expect(done).toHaveBeenCalledWith({ code: core.ExportResultCode.SUCCESS });
  });

  test("reports the first failure", () => {
    const exporter = new FanOutMetricExporter([
      fakeExporter(),
      fakeExporter(core.ExportResultCode.FAILED),
    ]);
    const done = vi.fn();

    exporter.export(resourceMetrics, done);

    expect(done).toHaveBeenCalledTimes(1);
    expect(done).toHaveBeenCalledWith({ code: core.ExportResultCode.FAILED });
  });

  test("flushes and shuts down every exporter", async () => {
    const first = fakeExporter();
    const second = fakeExporter();
    const exporter = new FanOutMetricExporter([first, second]);

    await exporter.forceFlush();
    await exporter.shutdown();

    expect(first.forceFlush).toHaveBeenCalledTimes(1);
    expect(second.shutdown).toHaveBeenCalledTimes(1);
  });

  test("defaults to cumulative temporality", () => {
    const exporter = new FanOutMetricExporter([fakeExporter()]);
    expect(
      exporter.selectAggregationTemporality(metrics.InstrumentType.COUNTER),
    ).toBe(metrics.AggregationTemporality.CUMULATIVE);
  });

  test("uses the first exporter that selects a temporality", () => {
    const delta: metrics.PushMetricExporter = {
      ...fakeExporter(),
      selectAggregationTemporality: () => metrics.AggregationTemporality.DELTA,
    };
    const exporter = new FanOutMetricExporter([fakeExporter(), delta]);
    expect(
      exporter.selectAggregationTemporality(metrics.InstrumentType.HISTOGRAM),
    ).toBe(metrics.AggregationTemporality.DELTA);
  });
});
