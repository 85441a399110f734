import React, { useRef, useEffect } from 'react';
import * as d3 from 'd3';
import { DEFAULT_THEME, toCssColor } from '../lib/theme';
import { seasonBars, type SeasonBar } from '../lib/seasonBars';
import type { FireSeason } from '../types';

interface SeasonSeverityChartProps {
  seasons: readonly FireSeason[];
  selectedIndex: number;
  onSelectSeason: (index: number) => void;
}

const CHART_HEIGHT = 140;

const SeasonSeverityChart: React.FC<SeasonSeverityChartProps> = ({
  seasons,
  selectedIndex,
  onSelectSeason
}) => {
  const svgRef = useRef<SVGSVGElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  const { colors } = DEFAULT_THEME;

  const drawChart = () => {
    if (!svgRef.current || !containerRef.current || seasons.length === 0) return;

    const svg = d3.select(svgRef.current);
    svg.selectAll("*").remove();

    const width = Math.max(400, containerRef.current.getBoundingClientRect().width);
    svg.attr("width", width).attr("height", CHART_HEIGHT);

    const bars = seasonBars(seasons, { width, height: CHART_HEIGHT });

    // Highlight behind the selected season, drawn first so bars sit on top
    const selected = bars[selectedIndex];
    if (selected) {
      svg.append("rect")
        .attr("x", selected.section.x)
        .attr("y", selected.section.y)
        .attr("width", selected.section.width)
        .attr("height", selected.section.height)
        .attr("fill", toCssColor(colors.lightBlue));
    }

    const sections = svg.selectAll<SVGGElement, SeasonBar>(".season")
      .data(bars)
      .enter().append("g")
      .attr("class", "season")
      .style("cursor", "pointer")
      .on("click", (_event, d) => onSelectSeason(bars.indexOf(d)));

    // Transparent hit area so the whole column is clickable
    sections.append("rect")
      .attr("x", d => d.section.x)
      .attr("y", d => d.section.y)
      .attr("width", d => d.section.width)
      .attr("height", d => d.section.height)
      .attr("fill", "transparent");

    // Forecast seasons use the lighter palette
    sections.append("rect")
      .attr("class", "count-bar")
      .attr("x", d => d.countBar.x)
      .attr("y", d => d.countBar.y)
      .attr("width", d => d.countBar.width)
      .attr("height", d => d.countBar.height)
      .attr("fill", d => toCssColor(d.forecast ? colors.lightRed : colors.red))
      .attr("stroke", d => d.isMaxCount ? toCssColor(colors.black) : "none")
      .attr("stroke-width", 3);

    sections.append("rect")
      .attr("class", "acreage-bar")
      .attr("x", d => d.acreageBar.x)
      .attr("y", d => d.acreageBar.y)
      .attr("width", d => d.acreageBar.width)
      .attr("height", d => d.acreageBar.height)
      .attr("fill", d => toCssColor(d.forecast ? colors.lightOrange : colors.orange))
      .attr("stroke", d => d.isMaxAcreage ? toCssColor(colors.black) : "none")
      .attr("stroke-width", 3);

    sections.append("text")
      .attr("x", d => d.section.x + d.section.width / 2)
      .attr("y", CHART_HEIGHT - 4)
      .style("text-anchor", "middle")
      .style("font-size", "12px")
      .style("font-weight", "bold")
      .text(d => d.year);

    svg.append("text")
      .attr("transform", `translate(12, ${CHART_HEIGHT / 2}) rotate(-90)`)
      .style("text-anchor", "middle")
      .style("font-size", "12px")
      .style("font-weight", "bold")
      .attr("fill", toCssColor(colors.red))
      .text("# of Fires");

    svg.append("text")
      .attr("transform", `translate(${width - 8}, ${CHART_HEIGHT / 2}) rotate(-90)`)
      .style("text-anchor", "middle")
      .style("font-size", "12px")
      .style("font-weight", "bold")
      .attr("fill", toCssColor(colors.orange))
      .text("Acreage");

    const tooltip = d3.select("body").append("div")
      .attr("class", "tooltip")
      .style("position", "absolute")
      .style("visibility", "hidden")
      .style("background", "white")
      .style("border", "1px solid #ccc")
      .style("border-radius", "4px")
      .style("padding", "8px")
      .style("font-size", "12px")
      .style("pointer-events", "none")
      .style("z-index", "1000");

    sections
      .on("mouseover", (_event, d) => {
        const season = seasons[bars.indexOf(d)];
        const approx = d.forecast ? "~" : "";
        tooltip.style("visibility", "visible")
          .html(`
            <div style="font-weight: bold; margin-bottom: 4px;">${d.year}${d.forecast ? " (forecast)" : ""}</div>
            <div>Fires: ${approx}${season.fireCount.toLocaleString()}</div>
            <div>Acreage: ${approx}${season.acreage.toLocaleString()}</div>
          `);
      })
      .on("mousemove", (event: MouseEvent) => {
        tooltip
          .style("top", (event.pageY - 10) + "px")
          .style("left", (event.pageX + 10) + "px");
      })
      .on("mouseout", () => {
        tooltip.style("visibility", "hidden");
      });

    return () => tooltip.remove();
  };

  // Redraw on data, selection and window size changes, one tooltip at a time
  useEffect(() => {
    let cleanup = drawChart();
    const handleResize = () => {
      if (cleanup) cleanup();
      cleanup = drawChart();
    };
    window.addEventListener("resize", handleResize);
    return () => {
      window.removeEventListener("resize", handleResize);
      if (cleanup) cleanup();
    };
  }, [seasons, selectedIndex]);

  if (seasons.length === 0) {
    return (
      <div className="flex items-center justify-center h-full">
        <p className="text-gray-500">No season data available</p>
      </div>
    );
  }

  return (
    <div ref={containerRef} className="w-full">
      <svg ref={svgRef} className="w-full" />
    </div>
  );
};

export default SeasonSeverityChart;
