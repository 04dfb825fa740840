// @vitest-environment jsdom
import { describe, it, expect, afterEach, vi } from "vitest";
import { render, screen, cleanup } from "@testing-library/react";
import { BarChart, HorizontalBars, PieChart, Sparkline, pieSlices } from "../charts.js";

afterEach(cleanup);

describe("pieSlices", () => {
  it("drops zero values and splits the circle by share", () => {
    const slices = pieSlices(
      [
        { label: "Cardio", value: 3 },
        { label: "Strength", value: 1 },
        { label: "Flexibility", value: 0 },
      ],
      50,
    );

    expect(slices.map((s) => [s.label, s.fraction])).toEqual([
      ["Cardio", 0.75],
      ["Strength", 0.25],
    ]);
    expect(slices[0].path).toContain("A50,50 0 1 1");
    expect(slices[1].path).toContain("A50,50 0 0 1");
  });

  it("draws a lone category as a full circle", () => {
    expect(pieSlices([{ label: "Cardio", value: 2 }], 50)[0].path).toBe("M50,0 A50,50 0 1 1 49.99,0 Z");
  });

  it("returns no slices when every value is zero", () => {
    expect(pieSlices([{ label: "Cardio", value: 0 }], 50)).toEqual([]);
  });
});

describe("PieChart", () => {
  it("renders one path and one legend entry per category", () => {
    const { container } = render(
      <PieChart
        data={[
          { label: "Cardio", value: 3 },
          { label: "Strength", value: 1 },
        ]}
      />,
    );

    expect(container.querySelectorAll("path")).toHaveLength(2);
    expect(screen.getByText("3 (75%)")).toBeTruthy();
    expect(screen.getByText("1 (25%)")).toBeTruthy();
  });

  it("renders nothing for empty data", () => {
    const { container } = render(<PieChart data={[]} />);
    expect(container.innerHTML).toBe("");
  });
});

describe("HorizontalBars", () => {
  it("truncates long labels and formats values", () => {
    render(<HorizontalBars data={[{ label: "Stationary cycling", value: 1200, suffix: " kcal" }]} />);

    expect(screen.getByText("Stationary c..")).toBeTruthy();
    expect(screen.getByText("1.2k kcal")).toBeTruthy();
  });
});

describe("Sparkline", () => {
  it("needs at least two points", () => {
    const { container } = render(<Sparkline data={[70]} />);
    expect(container.innerHTML).toBe("");
  });

  it("scales points between the padded edges", () => {
    const { container } = render(<Sparkline data={[70, 68.5]} />);
    expect(container.querySelector("polyline")?.getAttribute("points")).toBe("4,4 196,46");
  });
});

describe("BarChart", () => {
  it("labels every bar", () => {
    render(
      <BarChart
        data={[
          { label: "03/20", value: 30 },
          { label: "03/21", value: 35 },
        ]}
      />,
    );

    expect(screen.getByText("03/20")).toBeTruthy();
    expect(screen.getByText("03/21")).toBeTruthy();
  });

  it("draws every bar when two days share a label", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const { container } = render(
      <BarChart
        data={[
          { label: "08/20", value: 30 },
          { label: "08/20", value: 45 },
        ]}
      />,
    );

    expect(container.querySelectorAll("rect")).toHaveLength(2);
    expect(consoleError).not.toHaveBeenCalled();
    consoleError.mockRestore();
  });
});

describe("Sparkline with a long series", () => {
  it("scales a series too long to spread into an argument list", () => {
    const data = Array.from({ length: 200_000 }, (_, i) => (i === 0 ? 80 : 70));
    const { container } = render(<Sparkline data={data} width={200} height={50} showArea={false} showDot={false} />);
    const points = container.querySelector("polyline")?.getAttribute("points") ?? "";
    expect(points.startsWith("4,4 ")).toBe(true);
    expect(points.endsWith(" 196,46")).toBe(true);
  });
});
