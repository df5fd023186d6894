import fs from "fs";
import sharp from "sharp";
import type { DisplayRow } from "../models/tally";

export type LeaderboardRenderer = (left: DisplayRow[], right: DisplayRow[]) => Promise<Buffer>;

export const BOARD_ROWS = 10;

// Geometry of the two-column board, as fractions of the canvas
const DEFAULT_SIZE = { width: 768, height: 1152 };
const TABLE_TOP = 0.355;
const TABLE_BOTTOM = 0.905;
const LEFT_X = 0.205;
const RIGHT_X = 0.585;
const CELL_W = 0.315;
const MIN_FONT = 22;
const MAX_FONT = 52;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

// Largest size at which the name still fits the cell, assuming ~0.6em glyphs
export function fitFontSize(text: string, cellWidth: number): number {
  const length = Math.max(text.length, 1);
  const size = Math.floor(cellWidth / (length * 0.6));
  return Math.max(MIN_FONT, Math.min(MAX_FONT, size));
}

export function buildLeaderboardSvg(
  left: DisplayRow[],
  right: DisplayRow[],
  options: { width: number; height: number; withBackdrop: boolean }
): string {
  const { width: W, height: H } = options;
  const top = Math.floor(TABLE_TOP * H);
  const rowHeight = Math.floor((Math.floor(TABLE_BOTTOM * H) - top) / BOARD_ROWS);
  const cellW = Math.floor(CELL_W * W);

  const cell = (row: DisplayRow, index: number, colX: number) => {
    const fontSize = fitFontSize(row.name, cellW);
    const x = colX + Math.floor(cellW / 2);
    const y = top + index * rowHeight + Math.floor(rowHeight / 2);
    return `<text x="${x}" y="${y}" font-size="${fontSize}" text-anchor="middle" dominant-baseline="central">${escapeXml(row.name)}</text>`;
  };

  const cells: string[] = [];
  left.slice(0, BOARD_ROWS).forEach((row, i) => cells.push(cell(row, i, Math.floor(LEFT_X * W))));
  right.slice(0, BOARD_ROWS).forEach((row, i) => cells.push(cell(row, i, Math.floor(RIGHT_X * W))));

  const backdrop = options.withBackdrop
    ? [
        `<rect width="${W}" height="${H}" fill="#120821"/>`,
        `<text x="${Math.floor(LEFT_X * W + cellW / 2)}" y="${top - 40}" font-size="40" text-anchor="middle" fill="#ff4fd8">Top Gifters</text>`,
        `<text x="${Math.floor(RIGHT_X * W + cellW / 2)}" y="${top - 40}" font-size="40" text-anchor="middle" fill="#4fd8ff">Top Tappers</text>`,
      ].join("")
    : "";

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}" viewBox="0 0 ${W} ${H}">`,
    backdrop,
    `<g font-family="Montserrat, Inter, Arial, sans-serif" font-weight="bold" fill="#ffffff">`,
    cells.join(""),
    `</g>`,
    `</svg>`,
  ].join("");
}

/**
 * Renders the board to PNG. Names are drawn over the background image when
 * one exists, otherwise over a plain backdrop with column headings.
 */
export function createLeaderboardRenderer(backgroundPath?: string): LeaderboardRenderer {
  return async (left, right) => {
    if (backgroundPath && fs.existsSync(backgroundPath)) {
      const background = sharp(backgroundPath);
      const meta = await background.metadata();
      const width = meta.width ?? DEFAULT_SIZE.width;
      const height = meta.height ?? DEFAULT_SIZE.height;
      const svg = buildLeaderboardSvg(left, right, { width, height, withBackdrop: false });
      return background
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .png()
        .toBuffer();
    }

    const svg = buildLeaderboardSvg(left, right, { ...DEFAULT_SIZE, withBackdrop: true });
    return sharp(Buffer.from(svg)).png().toBuffer();
  };
}
