/**
 * Dataset Loader - reads the question file (CSV or an Excel workbook with a
 * header row, or a JSON array of objects) into Question records.
 *
 * Column names are matched case-insensitively; Spanish headers are accepted
 * alongside the English ones.
 */

import * as fs from 'fs';
import * as path from 'path';
import ExcelJS from 'exceljs';
import Papa from 'papaparse';
import { DatasetError } from '../config/errors.js';
import { Question } from '../council/types.js';
import { logger } from '../utils/logger.js';

export type QuestionField = 'id' | 'text' | 'correctAnswer' | 'image' | 'category1' | 'category2';

export const COLUMN_ALIASES: Record<QuestionField, string[]> = {
  id: ['id'],
  text: ['question', 'pregunta'],
  correctAnswer: ['correct_answer', 'respuesta_correcta'],
  image: ['image', 'image_path', 'ruta'],
  category1: ['category_1', 'categoria_1'],
  category2: ['category_2', 'categoria_2'],
};

const REQUIRED_FIELDS: QuestionField[] = ['text', 'correctAnswer', 'image'];

export const UNKNOWN_CATEGORY = 'Unknown';

type Row = Record<string, unknown>;

function normalizeRow(row: Row): Row {
  const normalized: Row = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key.trim().toLowerCase()] = value;
  }
  return normalized;
}

function cell(row: Row, field: QuestionField): string {
  for (const alias of COLUMN_ALIASES[field]) {
    const value = row[alias];
    if (value !== undefined && value !== null && String(value).trim() !== '') {
      return String(value).trim();
    }
  }
  return '';
}

function hasColumn(columns: Set<string>, field: QuestionField): boolean {
  return COLUMN_ALIASES[field].some(alias => columns.has(alias));
}

/**
 * Turn raw rows into questions. Rows without an id get their 0-based index.
 */
export function parseQuestionRows(rawRows: Row[], imageBasePath: string, source = 'dataset'): Question[] {
  const rows = rawRows.map(normalizeRow);

  const columns = new Set(rows.flatMap(row => Object.keys(row)));
  const missing = REQUIRED_FIELDS.filter(field => !hasColumn(columns, field));
  if (rows.length > 0 && missing.length > 0) {
    const names = missing.map(field => COLUMN_ALIASES[field].join('|'));
    throw new DatasetError(`Missing required column(s): ${names.join(', ')}`, source);
  }

  const seen = new Set<number>();
  return rows.map((row, index) => {
    const rawId = cell(row, 'id');
    const id = rawId === '' ? index : Number(rawId);
    if (!Number.isInteger(id)) {
      throw new DatasetError(`Row ${index + 1}: id "${rawId}" is not an integer`, source);
    }
    if (seen.has(id)) {
      throw new DatasetError(`Duplicate question id: ${id}`, source);
    }
    seen.add(id);

    const image = cell(row, 'image');
    return {
      id,
      text: cell(row, 'text'),
      imagePath: path.isAbsolute(image) ? image : path.join(imageBasePath, image),
      correctAnswer: cell(row, 'correctAnswer').toLowerCase(),
      category1: cell(row, 'category1') || UNKNOWN_CATEGORY,
      category2: cell(row, 'category2') || UNKNOWN_CATEGORY,
    };
  });
}

function readCsv(content: string, source: string): Row[] {
  const parsed = Papa.parse<Row>(content, {
    header: true,
    skipEmptyLines: true,
  });

  // A one-column file cannot have its delimiter guessed; that is not fatal
  const fatal = parsed.errors.filter(error => error.type !== 'Delimiter');
  if (fatal.length > 0) {
    const first = fatal[0];
    throw new DatasetError(`CSV parse error at row ${first.row ?? '?'}: ${first.message}`, source);
  }
  return parsed.data;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(content: string, source: string): Row[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new DatasetError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }
  if (!Array.isArray(parsed) || !parsed.every(isRow)) {
    throw new DatasetError('JSON dataset must be an array of objects', source);
  }
  return parsed;
}

/**
 * First worksheet only; row 1 holds the headers and cells are read as their display text
 */
async function readWorkbook(source: string): Promise<Row[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(source);
  } catch (error) {
    throw new DatasetError(
      `Cannot read workbook: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new DatasetError('Workbook has no worksheets', source);
  }

  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell((cell, column) => {
    headers.set(column, cell.text);
  });

  const rows: Row[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: Row = {};
    row.eachCell((cell, column) => {
      const header = headers.get(column);
      if (header) {
        record[header] = cell.text;
      }
    });
    if (Object.keys(record).length > 0) {
      rows.push(record);
    }
  });
  return rows;
}

function readText(datasetPath: string): string {
  try {
    return fs.readFileSync(datasetPath, 'utf-8');
  } catch (error) {
    throw new DatasetError(
      `Cannot read dataset: ${error instanceof Error ? error.message : String(error)}`,
      datasetPath
    );
  }
}

/**
 * Load questions from a .csv, .json or .xlsx file. Image paths are resolved
 * against `imageBasePath`, which defaults to the dataset's own directory.
 */
export async function loadQuestions(datasetPath: string, imageBasePath?: string): Promise<Question[]> {
  if (!fs.existsSync(datasetPath)) {
    throw new DatasetError(`Dataset not found: ${datasetPath}`, datasetPath);
  }

  const extension = path.extname(datasetPath).toLowerCase();
  let rows: Row[];
  switch (extension) {
    case '.csv':
      rows = readCsv(readText(datasetPath), datasetPath);
      break;
    case '.json':
      rows = readJson(readText(datasetPath), datasetPath);
      break;
    case '.xlsx':
      rows = await readWorkbook(datasetPath);
      break;
    default:
      throw new DatasetError(
        `Unsupported dataset format "${extension}" (expected .csv, .json or .xlsx)`,
        datasetPath
      );
  }

  const questions = parseQuestionRows(rows, imageBasePath ?? path.dirname(datasetPath), datasetPath);
  logger.info(`Loaded ${questions.length} questions from ${datasetPath}`);
  return questions;
}
