import PDFDocument from "pdfkit";
import ExcelJS from "exceljs";
import type { CalculationRun, SelectionReport } from "@shared/schema";

type Row = [string, string | number, string];

const POWER_SOURCE_LABELS: Record<CalculationRun["mainPowerSource"], string> = {
  direct: "Supplied directly",
  simulation: "Process simulation",
  estimate: "Empirical estimate",
};

function sanitize(text: string): string {
  if (!text) return "";
  return text
    .replace(/×/g, "x")
    .replace(/³/g, "3")
    .replace(/₂/g, "2")
    .replace(/·/g, ".")
    .replace(/–/g, "-")
    .replace(/—/g, "--")
    .replace(/ /g, " ");
}

function fmtNum(val: number | undefined, decimals: number = 2): string {
  if (val === undefined || Number.isNaN(val)) return "-";
  return val.toLocaleString("en-US", { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

function camelToTitle(key: string): string {
  return key.replace(/([A-Z])/g, " $1").replace(/^./, (s) => s.toUpperCase()).trim();
}

function reportRows(report: SelectionReport): Row[] {
  const rows: Row[] = [
    ["Model", report.modelCode, ""],
    ["Design Type", report.designType === "dual_stage" ? "Dual-stage" : "Single-stage", ""],
    ["Selected Unit Power", report.selectedUnitPower, "kW"],
    ["Quote", report.quote, "10^4 CNY"],
    ["Dimensions (L x W x H)", report.dimensionsLabel, "m"],
    ["Weight / Max Maintenance Lift", report.weightLabel, ""],
    ["Net Power Output", Number(report.netPowerOutput.toFixed(2)), "kW"],
    ["Annual Power Income", Number(report.annualPowerIncome.toFixed(4)), "10^4 CNY"],
    ["Payback Period", report.paybackPeriodYears, "years"],
  ];
  if (report.stageSplit) {
    rows.push(
      ["First Stage Power", Number(report.stageSplit.firstStagePower.toFixed(0)), "kW"],
      ["Second Stage Power", Number(report.stageSplit.secondStagePower.toFixed(0)), "kW"],
      ["Sizing Power", Number(report.stageSplit.sizingPower.toFixed(2)), "kW"],
    );
  }
  return rows;
}

const STAGE_UNITS: Record<string, string> = {
  inputPower: "kW",
  mainLossPower: "kW",
  mainOutputPower: "kW",
  totalPowerGeneration: "kW",
  lubricationOilAmount: "",
  oilCoolerCirculationWater: "t/h",
  oilPumpPower: "kW",
  lubricationHeaterPower: "kW",
  coolingLoopPumpPower: "kW",
  circulationPumpPower: "kW",
  utilitySelfConsumption: "kW",
  netPowerOutput: "kW",
  airDemand: "Nm3/h",
  nitrogenDemand: "Nm3/h",
  annualPowerGeneration: "10^4 kWh",
  annualPowerIncome: "10^4 CNY",
  annualCoalSavings: "t",
  annualCoalCostSavings: "10^4 CNY",
  annualCo2Reduction: "t",
  unitSelection: "kW",
  lookupPower: "kW",
  unitWeight: "t",
  maintenanceLiftWeight: "t",
};

function recordRows(record: object): Row[] {
  const rows: Row[] = [];
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "number") {
      rows.push([camelToTitle(key), value, STAGE_UNITS[key] ?? ""]);
    } else if (Array.isArray(value)) {
      rows.push([camelToTitle(key), value.join(" x "), "m"]);
    } else if (typeof value === "string") {
      rows.push([camelToTitle(key), value, ""]);
    }
  }
  return rows;
}

function stageSections(run: CalculationRun): [string, Row[]][] {
  return [
    ["Main Engine", recordRows(run.results.mainEngine)],
    ["Utility Power", recordRows(run.results.utilityPower)],
    ["Economic Analysis", recordRows(run.results.economicAnalysis)],
    ["Unit Selection", recordRows(run.results.unitSelection)],
  ];
}

function parameterSections(run: CalculationRun): [string, Row[]][] {
  return [
    ["Main Engine Parameters", recordRows(run.inputs.mainEngine)],
    ["Utility Parameters", recordRows(run.inputs.utility)],
    ["Economic Parameters", recordRows(run.inputs.economic)],
    ["Unit Selection Parameters", recordRows(run.inputs.unitSelection)],
  ];
}

/** Process conditions behind a simulated run; empty for directly supplied shaft power. */
export function technicalParameterRows(run: CalculationRun): Row[] {
  if (!run.simulation) return [];
  const { request, properties } = run.simulation;
  const outletTemperature = properties?.outletTemperature;
  return [
    ["Inlet / Outlet Pressure", `${request.inletPressure}/${request.outletPressure}`, "MPaA"],
    [
      "Inlet / Outlet Temperature",
      `${request.inletTemperature}/${typeof outletTemperature === "number" ? outletTemperature : "N/A"}`,
      "°C",
    ],
    ["Gas Flow Rate", request.gasFlowRate, "scmh"],
    ["Efficiency", request.efficiency, "%"],
    ["Power Output", run.mainPower, "kW"],
  ];
}

export interface SkidLayout {
  lengthLabel: string;
  widthLabel: string;
  stages: { label: string; powerLabel: string }[];
}

/** Plan view of the enclosure: one turbine-generator train per expander stage. */
export function describeLayout(report: SelectionReport): SkidLayout {
  const [length, width] = report.unitDimensions;
  const trains: [string, number][] = report.stageSplit
    ? [
        ["Stage 1", report.stageSplit.firstStagePower],
        ["Stage 2", report.stageSplit.secondStagePower],
      ]
    : [["Turbine", report.netPowerOutput]];
  return {
    lengthLabel: `${length}m`,
    widthLabel: `${width}m`,
    stages: trains.map(([label, power]) => ({ label, powerLabel: `Net power: ${Math.trunc(power)} kW` })),
  };
}

function formatCell(value: string | number): string {
  return typeof value === "number" ? fmtNum(value, 4) : sanitize(value);
}

// ---------------------------------------------------------------------------
// PDF
// ---------------------------------------------------------------------------

function drawTable(
  doc: InstanceType<typeof PDFDocument>,
  headers: string[],
  rows: string[][],
  startX: number,
  startY: number,
  colWidths: number[],
): number {
  const fontSize = 8;
  const headerBg = "#323F4F";
  const minRowHeight = 16;
  const cellPadding = 3;
  const pageHeight = 792;
  const tableWidth = colWidths.reduce((a, b) => a + b, 0);
  let y = startY;

  const measureRowHeight = (cells: string[], bold: boolean): number => {
    let maxH = minRowHeight;
    for (let i = 0; i < cells.length; i++) {
      doc.font(bold ? "Helvetica-Bold" : "Helvetica").fontSize(fontSize);
      const textH = doc.heightOfString(cells[i] || "", { width: colWidths[i] - cellPadding * 2 });
      maxH = Math.max(maxH, textH + cellPadding * 2);
    }
    return maxH;
  };

  const drawRow = (cells: string[], bold: boolean, bgColor?: string) => {
    const rowH = measureRowHeight(cells, bold);
    if (y + rowH > pageHeight - 60) {
      doc.addPage();
      y = 50;
      drawRow(headers, true, headerBg);
    }
    if (bgColor) {
      doc.rect(startX, y, tableWidth, rowH).fill(bgColor);
    }
    let x = startX;
    for (let i = 0; i < cells.length; i++) {
      doc.font(bold ? "Helvetica-Bold" : "Helvetica")
        .fontSize(fontSize)
        .fillColor(bgColor === headerBg ? "#FFFFFF" : "#44546A")
        .text(cells[i] || "", x + cellPadding, y + cellPadding, {
          width: colWidths[i] - cellPadding * 2,
          lineBreak: true,
        });
      x += colWidths[i];
    }
    doc.rect(startX, y, tableWidth, rowH).lineWidth(0.5).strokeColor("#CFD1D4").stroke();
    y += rowH;
  };

  drawRow(headers, true, headerBg);
  rows.forEach((row, idx) => drawRow(row, false, idx % 2 === 1 ? "#E9E9EB" : undefined));
  return y;
}

function addSectionHeader(doc: InstanceType<typeof PDFDocument>, title: string, y: number, leftMargin: number, contentWidth: number): number {
  if (y > 700) {
    doc.addPage();
    y = 50;
  }
  doc.font("Helvetica-Bold").fontSize(12).fillColor("#00B050")
    .text(title, leftMargin, y, { width: contentWidth });
  y += 20;
  doc.moveTo(leftMargin, y).lineTo(leftMargin + contentWidth, y).lineWidth(0.5).strokeColor("#CFD1D4").stroke();
  return y + 8;
}

function drawLayout(
  doc: InstanceType<typeof PDFDocument>,
  report: SelectionReport,
  y: number,
  leftMargin: number,
  contentWidth: number,
): number {
  const maxDrawingHeight = 160;
  if (y + maxDrawingHeight + 70 > 792 - 60) {
    doc.addPage();
    y = 50;
  }
  const layout = describeLayout(report);
  const [length, width] = report.unitDimensions;
  const scale = Math.min((contentWidth - 60) / length, maxDrawingHeight / width);
  const rectW = length * scale;
  const rectH = width * scale;
  const x0 = leftMargin + 40;
  const y0 = y + 25;

  doc.rect(x0, y0, rectW, rectH).lineWidth(2).strokeColor("#323F4F").stroke();

  // Dimension lines
  doc.moveTo(x0, y0 - 10).lineTo(x0 + rectW, y0 - 10).lineWidth(1).strokeColor("#1F4E79").stroke();
  doc.font("Helvetica").fontSize(8).fillColor("#1F4E79")
    .text(layout.lengthLabel, x0, y0 - 22, { width: rectW, align: "center" });
  doc.moveTo(x0 - 10, y0).lineTo(x0 - 10, y0 + rectH).stroke();
  doc.text(layout.widthLabel, x0 - 40, y0 + rectH / 2 - 4, { width: 26, align: "right" });

  const bay = rectW / layout.stages.length;
  layout.stages.forEach((stage, i) => {
    const bx = x0 + i * bay;
    const cy = y0 + rectH / 2;
    const turbineW = bay * 0.3;
    const turbineH = rectH * 0.5;
    const radius = Math.min(bay * 0.15, rectH * 0.2);
    const genX = bx + bay * 0.7;

    if (i > 0) {
      doc.moveTo(bx, y0).lineTo(bx, y0 + rectH).lineWidth(0.5).dash(4, { space: 3 }).strokeColor("#8496B0").stroke().undash();
    }
    doc.moveTo(bx + 10 + turbineW, cy).lineTo(genX - radius, cy).lineWidth(2).strokeColor("#44546A").stroke();
    doc.rect(bx + 10, cy - turbineH / 2, turbineW, turbineH).lineWidth(1).fillAndStroke("#BDD7EE", "#323F4F");
    doc.circle(genX, cy, radius).lineWidth(1).fillAndStroke("#C6EFCE", "#323F4F");

    doc.font("Helvetica-Bold").fontSize(8).fillColor("#323F4F")
      .text(stage.label, bx + 10, cy - turbineH / 2 - 12, { width: turbineW, align: "center" });
    doc.font("Helvetica-Bold").fontSize(10).fillColor("#323F4F")
      .text("G", genX - radius, cy - 5, { width: radius * 2, align: "center" });
    doc.font("Helvetica").fontSize(8).fillColor("#C00000")
      .text(stage.powerLabel, bx + 4, cy + turbineH / 2 + 6, { width: bay - 8, align: "center" });
  });

  return y0 + rectH + 20;
}

export function exportCalculationPDF(run: CalculationRun): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "letter", margins: { top: 50, bottom: 50, left: 50, right: 50 } });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    const leftMargin = 50;
    const contentWidth = 512;
    const widths = [220, 172, 120];

    doc.font("Helvetica-Bold").fontSize(18).fillColor("#323F4F")
      .text("Power Skid Selection Report", leftMargin, 50, { align: "center", width: contentWidth });
    doc.font("Helvetica").fontSize(10).fillColor("#8496B0")
      .text(`Calculation: ${sanitize(run.name)}`, leftMargin, 75, { align: "center", width: contentWidth })
      .text(`Shaft power: ${fmtNum(run.mainPower)} kW (${POWER_SOURCE_LABELS[run.mainPowerSource]})`, leftMargin, 88, { align: "center", width: contentWidth })
      .text(`Generated: ${run.createdAt.toLocaleDateString("en-US")}`, leftMargin, 101, { align: "center", width: contentWidth });

    let y = 130;
    y = addSectionHeader(doc, "Selection", y, leftMargin, contentWidth);
    y = drawTable(doc, ["Item", "Value", "Unit"], reportRows(run.report).map(([k, v, u]) => [k, formatCell(v), u]), leftMargin, y, widths);
    y += 15;

    const technical = technicalParameterRows(run);
    if (technical.length > 0) {
      y = addSectionHeader(doc, "Technical Parameters", y, leftMargin, contentWidth);
      y = drawTable(doc, ["Parameter", "Value", "Unit"], technical.map(([k, v, u]) => [k, formatCell(v), u]), leftMargin, y, widths);
      y += 15;
    }

    y = addSectionHeader(doc, "Layout", y, leftMargin, contentWidth);
    y = drawLayout(doc, run.report, y, leftMargin, contentWidth);
    y += 15;

    for (const [title, rows] of [...stageSections(run), ...parameterSections(run)]) {
      y = addSectionHeader(doc, title, y, leftMargin, contentWidth);
      y = drawTable(doc, ["Parameter", "Value", "Unit"], rows.map(([k, v, u]) => [k, formatCell(v), u]), leftMargin, y, widths);
      y += 15;
    }

    const checks = run.report.checks;
    y = addSectionHeader(doc, "Checks", y, leftMargin, contentWidth);
    drawTable(
      doc,
      ["Check", "Result", ""],
      [
        ["Net power positive", checks.netPowerPositive ? "Pass" : "Fail", ""],
        ["Annual income positive", checks.incomePositive ? "Pass" : "Fail", ""],
        ["System efficiency in (0, 1)", checks.systemEfficiencyInRange ? "Pass" : "Fail", ""],
      ],
      leftMargin,
      y,
      widths,
    );

    doc.end();
  });
}

// ---------------------------------------------------------------------------
// Excel
// ---------------------------------------------------------------------------

const HEADER_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF323F4F" } };
const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 11 };
const SECTION_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF00B050" } };
const SECTION_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 12 };
const ALT_ROW_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FFE9E9EB" } };
const BORDER_THIN: Partial<ExcelJS.Borders> = {
  top: { style: "thin", color: { argb: "FFCFD1D4" } },
  bottom: { style: "thin", color: { argb: "FFCFD1D4" } },
  left: { style: "thin", color: { argb: "FFCFD1D4" } },
  right: { style: "thin", color: { argb: "FFCFD1D4" } },
};

function addSectionTitle(ws: ExcelJS.Worksheet, row: number, title: string, colSpan: number): void {
  const r = ws.getRow(row);
  const cell = r.getCell(1);
  cell.value = title;
  cell.fill = SECTION_FILL;
  cell.font = SECTION_FONT;
  cell.alignment = { horizontal: "left", vertical: "middle" };
  if (colSpan > 1) ws.mergeCells(row, 1, row, colSpan);
  r.height = 24;
}

function applyTableHeaders(ws: ExcelJS.Worksheet, row: number, headers: string[]): void {
  const r = ws.getRow(row);
  headers.forEach((h, i) => {
    const cell = r.getCell(i + 1);
    cell.value = h;
    cell.fill = HEADER_FILL;
    cell.font = HEADER_FONT;
    cell.alignment = { horizontal: "center", vertical: "middle" };
    cell.border = BORDER_THIN;
  });
  r.height = 20;
}

function addDataRow(ws: ExcelJS.Worksheet, row: number, values: (string | number)[], isAlt: boolean): void {
  const r = ws.getRow(row);
  values.forEach((v, i) => {
    const cell = r.getCell(i + 1);
    cell.value = v;
    cell.border = BORDER_THIN;
    cell.alignment = { vertical: "middle", horizontal: i === 0 ? "left" : "center" };
    if (isAlt) cell.fill = ALT_ROW_FILL;
  });
  r.height = 18;
}

function writeSections(ws: ExcelJS.Worksheet, sections: [string, Row[]][]): void {
  ws.getColumn(1).width = 34;
  ws.getColumn(2).width = 22;
  ws.getColumn(3).width = 14;
  let r = 1;
  for (const [title, rows] of sections) {
    addSectionTitle(ws, r++, title, 3);
    applyTableHeaders(ws, r++, ["Parameter", "Value", "Unit"]);
    rows.forEach((row, idx) => addDataRow(ws, r++, row, idx % 2 === 1));
    r++;
  }
}

export async function exportCalculationExcel(run: CalculationRun): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();
  wb.creator = "Power Skid Calculator";
  wb.created = run.createdAt;

  const selectionSections: [string, Row[]][] = [
    [
      "Calculation",
      [
        ["Name", run.name, ""],
        ["Shaft Power", run.mainPower, "kW"],
        ["Shaft Power Source", POWER_SOURCE_LABELS[run.mainPowerSource], ""],
      ],
    ],
    ["Selection", reportRows(run.report)],
  ];
  const technical = technicalParameterRows(run);
  if (technical.length > 0) selectionSections.push(["Technical Parameters", technical]);

  const wsSelection = wb.addWorksheet("Selection", { properties: { tabColor: { argb: "FF00B050" } } });
  writeSections(wsSelection, selectionSections);

  writeSections(wb.addWorksheet("Stage Results", { properties: { tabColor: { argb: "FF44546A" } } }), stageSections(run));
  writeSections(wb.addWorksheet("Parameters", { properties: { tabColor: { argb: "FF8496B0" } } }), parameterSections(run));

  const buffer = await wb.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
