import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { renderChart } from "../core/chart.js";
import { sampleDataset } from "../core/sample.js";
import { CommandDispatcher } from "../commands/dispatch.js";
import { MemoryBufferProvider } from "../session/buffers.js";

const BUFFER = [
  "const df = DataFrame({",
  "  Open: [100, 105, 110],",
  "  High: [110, 115, 120],",
  "  Low: [90, 95, 100],",
  "  Close: [105, 110, 115],",
  "  Volume: [1000, 1200, 1500],",
  "});",
].join("\n");

describe("CommandDispatcher", () => {
  let provider: MemoryBufferProvider;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    provider = new MemoryBufferProvider({ "prices.js": BUFFER });
    dispatcher = new CommandDispatcher(provider);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("rendering", () => {
    it("renders the sample", () => {
      const lines = dispatcher.renderSample().split("\n");

      expect(lines).toHaveLength(10);
      expect(lines.every((line) => line.length === 15)).toBe(true);
    });

    it("renders a JSON dataset", () => {
      const json = '{"Open":[100],"High":[108],"Low":[98],"Close":[105],"Volume":[1000]}';
      expect(dispatcher.renderSerialized(json).split("\n")).toEqual([
        " | ",
        " | ",
        " | ",
        " ^ ",
        " ^ ",
        " ^ ",
        " ^ ",
        " ^ ",
        " | ",
        " | ",
      ]);
    });

    it("passes the flat range message through", () => {
      expect(dispatcher.renderSerialized('{"Open":[1],"High":[1],"Low":[1],"Close":[1]}')).toBe(
        "Price range is flat, cannot render meaningful chart."
      );
    });

    it("reports bad JSON as an error line", () => {
      expect(dispatcher.renderSerialized("{not json").startsWith("Error: Invalid dataset JSON: ")).toBe(true);
    });

    it("renders a buffer's DataFrame", () => {
      expect(dispatcher.renderSession("df", "prices.js").split("\n")).toHaveLength(10);
    });

    it("names the DataFrames a buffer does define", () => {
      expect(dispatcher.renderSession("nope", "prices.js")).toBe(
        "Error: Variable 'nope' not found. Available DataFrames: df(DataFrame)"
      );
    });

    it("exports a buffer's DataFrame as JSON", () => {
      expect(dispatcher.toSerialized("df", "prices.js")).toBe(
        '{"Open":[100,105,110],"High":[110,115,120],"Low":[90,95,100],"Close":[105,110,115],"Volume":[1000,1200,1500]}'
      );
    });
  });

  describe("adjustCandle", () => {
    it("writes the buffer and returns the new chart", () => {
      const chart = dispatcher.adjustCandle(0, "open", 1, "df", "prices.js");

      expect(provider.getText("prices.js")).toContain("  Open: [101, 105, 110],");
      expect(chart.split("\n")).toHaveLength(10);
      expect(chart).toBe(dispatcher.renderSession("df", "prices.js"));
    });

    it("extends high once open passes it", () => {
      for (let i = 0; i < 11; i++) dispatcher.adjustCandle(0, "open", 1, "df", "prices.js");

      expect(dispatcher.getDatasetSlice(0, "df", "prices.js")).toBe(
        '{"index":0,"Open":111,"High":111,"Low":90,"Close":105,"Volume":1000}'
      );
    });

    it("leaves the buffer alone when the index is out of range", () => {
      expect(dispatcher.adjustCandle(10, "open", 1, "df", "prices.js")).toBe("Error: Candle index 10 out of range (0-2)");
      expect(provider.getText("prices.js")).toBe(BUFFER);
    });

    it("rejects unknown fields", () => {
      expect(dispatcher.adjustCandle(0, "volume", 1, "df", "prices.js")).toBe("Error: Invalid value type: volume");
    });

    it("reports buffers the host does not have", () => {
      expect(dispatcher.adjustCandle(0, "open", 1, "df", "missing.js")).toBe("Error: Buffer 'missing.js' is not available");
    });
  });

  describe("getDatasetSlice", () => {
    it("reads a sample candle without a session", () => {
      expect(dispatcher.getDatasetSlice(1)).toBe('{"index":1,"Open":105,"High":112,"Low":103,"Close":110,"Volume":1200}');
    });

    it("rejects indexes past the end", () => {
      expect(dispatcher.getDatasetSlice(7)).toBe("Error: Candle index 7 out of range (0-4)");
    });
  });

  describe("getPriceNearest", () => {
    it("maps the top and bottom rows to the extremes", () => {
      expect(dispatcher.getPriceNearest(4, 0)).toBe('{"field":"high","value":118,"rowPrice":118}');
      expect(dispatcher.getPriceNearest(0, 9)).toBe('{"field":"low","value":98,"rowPrice":98}');
    });

    it("picks the closest price for rows in between", () => {
      const nearest: unknown = JSON.parse(dispatcher.getPriceNearest(1, 3));

      expect(nearest).toMatchObject({ field: "high", value: 112 });
      expect(nearest).toHaveProperty("rowPrice");
      const rowPrice = typeof nearest === "object" && nearest !== null && "rowPrice" in nearest ? nearest.rowPrice : NaN;
      expect(rowPrice).toBeCloseTo(111.333, 3);
    });

    it("rejects rows outside the chart", () => {
      expect(dispatcher.getPriceNearest(0, 10)).toBe("Error: Row position 10 out of range (0-9)");
    });

    it("works on a session's DataFrame", () => {
      expect(dispatcher.getPriceNearest(2, 0, "df", "prices.js")).toBe('{"field":"high","value":120,"rowPrice":120}');
    });
  });

  describe("cursor", () => {
    it("moves the cursor and reports its grid position", () => {
      expect(dispatcher.moveCursor(2, 1, "df", "prices.js")).toBe('{"row":2,"col":1,"line":3,"column":4}');
    });

    it("navigates within the chart", () => {
      expect(dispatcher.navigate("right", "df", "prices.js")).toBe('{"row":0,"col":1,"line":1,"column":4}');
      expect(dispatcher.navigate("down", "df", "prices.js")).toBe('{"row":1,"col":1,"line":2,"column":4}');
      dispatcher.navigate("left", "df", "prices.js");
      expect(dispatcher.navigate("left", "df", "prices.js")).toBe('{"row":1,"col":0,"line":2,"column":1}');
    });

    it("rejects unknown directions", () => {
      expect(dispatcher.navigate("sideways", "df", "prices.js")).toBe(
        "Error: Invalid direction: sideways (expected left, right, up or down)"
      );
    });
  });

  it("logs and converts unexpected failures", () => {
    vi.spyOn(provider, "getText").mockImplementation(() => {
      throw new Error("boom");
    });
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(dispatcher.renderSession("df", "prices.js")).toBe("Error: boom");
    expect(consoleError).toHaveBeenCalledWith("❌ renderSession failed: boom");
  });

  it("renders the same sample as the chart module", () => {
    expect(dispatcher.renderSample()).toBe(renderChart(sampleDataset()));
  });
});
