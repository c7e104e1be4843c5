import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { loadQuestions, parseQuestionRows } from '../DatasetLoader.js';
import { DatasetError } from '../../config/errors.js';

describe('parseQuestionRows', () => {
  it('should map English columns and resolve relative image paths', () => {
    const [question] = parseQuestionRows([{
      id: '7',
      question: 'Which finding is shown?',
      correct_answer: 'B',
      image: 'images/7.png',
      category_1: 'Radiology',
      category_2: 'Chest',
    }], '/data');

    expect(question).toEqual({
      id: 7,
      text: 'Which finding is shown?',
      imagePath: path.join('/data', 'images/7.png'),
      correctAnswer: 'b',
      category1: 'Radiology',
      category2: 'Chest',
    });
  });

  it('should accept Spanish headers in any case', () => {
    const [question] = parseQuestionRows([{
      ID: 3,
      Pregunta: '¿Qué muestra la imagen?',
      Respuesta_Correcta: 'c',
      Ruta: '/abs/3.jpg',
      Categoria_1: 'Dermatología',
    }], '/data');

    expect(question.id).toBe(3);
    expect(question.text).toBe('¿Qué muestra la imagen?');
    expect(question.imagePath).toBe('/abs/3.jpg');
    expect(question.category1).toBe('Dermatología');
    expect(question.category2).toBe('Unknown');
  });

  it('should number rows without an id from zero', () => {
    const rows = [
      { question: 'q0', correct_answer: 'a', image: '0.png' },
      { question: 'q1', correct_answer: 'b', image: '1.png' },
    ];
    expect(parseQuestionRows(rows, '/data').map(q => q.id)).toEqual([0, 1]);
  });

  it('should reject missing required columns', () => {
    expect(() => parseQuestionRows([{ question: 'q', image: 'x.png' }], '/data')).toThrow(
      'Missing required column(s): correct_answer|respuesta_correcta'
    );
  });

  it('should reject duplicate ids', () => {
    const rows = [
      { id: '1', question: 'q', correct_answer: 'a', image: 'a.png' },
      { id: '1', question: 'q', correct_answer: 'b', image: 'b.png' },
    ];
    expect(() => parseQuestionRows(rows, '/data')).toThrow('Duplicate question id: 1');
  });

  it('should reject a non-integer id', () => {
    const rows = [{ id: 'abc', question: 'q', correct_answer: 'a', image: 'a.png' }];
    expect(() => parseQuestionRows(rows, '/data')).toThrow('Row 1: id "abc" is not an integer');
  });

  it('should accept an empty dataset', () => {
    expect(parseQuestionRows([], '/data')).toEqual([]);
  });
});

describe('loadQuestions', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'council-dataset-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read a CSV with quoted fields, resolving images beside the file', async () => {
    const csvPath = path.join(tempDir, 'questions.csv');
    fs.writeFileSync(csvPath, [
      'id,question,correct_answer,image,category_1,category_2',
      '1,"Which is it? a) one, b) two",A,1.png,Radiology,Chest',
      '',
      '2,Second question,d,2.png,Radiology,Abdomen',
    ].join('\n'));

    const questions = await loadQuestions(csvPath);

    expect(questions).toHaveLength(2);
    expect(questions[0].text).toBe('Which is it? a) one, b) two');
    expect(questions[0].correctAnswer).toBe('a');
    expect(questions[0].imagePath).toBe(path.join(tempDir, '1.png'));
    expect(questions[1].category2).toBe('Abdomen');
  });

  it('should resolve images against an explicit base path', async () => {
    const csvPath = path.join(tempDir, 'questions.csv');
    fs.writeFileSync(csvPath, 'question,correct_answer,image\nq,a,x.png\n');

    const [question] = await loadQuestions(csvPath, '/images');
    expect(question.imagePath).toBe(path.join('/images', 'x.png'));
  });

  it('should read a JSON array', async () => {
    const jsonPath = path.join(tempDir, 'questions.json');
    fs.writeFileSync(jsonPath, JSON.stringify([
      { id: 10, pregunta: 'p', respuesta_correcta: 'B', image_path: 'i.png' },
    ]));

    const [question] = await loadQuestions(jsonPath);
    expect(question.id).toBe(10);
    expect(question.correctAnswer).toBe('b');
  });

  it('should reject JSON that is not an array of objects', async () => {
    const jsonPath = path.join(tempDir, 'questions.json');
    fs.writeFileSync(jsonPath, '{"id": 1}');
    await expect(loadQuestions(jsonPath)).rejects.toThrow('JSON dataset must be an array of objects');
  });

  it('should reject a missing file', async () => {
    const missing = path.join(tempDir, 'nope.csv');
    await expect(loadQuestions(missing)).rejects.toThrow(`Dataset not found: ${missing}`);
  });

  it('should read the first worksheet of an Excel workbook', async () => {
    const xlsxPath = path.join(tempDir, 'questions.xlsx');
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Preguntas');
    sheet.addRow(['ID', 'Pregunta', 'Respuesta_Correcta', 'Ruta', 'Categoria_1']);
    sheet.addRow([7, 'Which lobe? a) upper b) lower', 'B', 'scans/7.png', 'CT']);
    sheet.addRow([8, 'Second', 'c', 'scans/8.png']);
    workbook.addWorksheet('Notes').addRow(['ignored']);
    await workbook.xlsx.writeFile(xlsxPath);

    const questions = await loadQuestions(xlsxPath);

    expect(questions).toEqual([
      {
        id: 7,
        text: 'Which lobe? a) upper b) lower',
        imagePath: path.join(tempDir, 'scans/7.png'),
        correctAnswer: 'b',
        category1: 'CT',
        category2: 'Unknown',
      },
      {
        id: 8,
        text: 'Second',
        imagePath: path.join(tempDir, 'scans/8.png'),
        correctAnswer: 'c',
        category1: 'Unknown',
        category2: 'Unknown',
      },
    ]);
  });

  it('should reject a file that is not a workbook', async () => {
    const xlsxPath = path.join(tempDir, 'questions.xlsx');
    fs.writeFileSync(xlsxPath, 'not a zip archive');
    await expect(loadQuestions(xlsxPath)).rejects.toThrow(/^Cannot read workbook: /);
  });

  it('should reject unsupported formats', async () => {
    const txtPath = path.join(tempDir, 'questions.txt');
    fs.writeFileSync(txtPath, 'id,question');
    await expect(loadQuestions(txtPath)).rejects.toThrow(DatasetError);
    await expect(loadQuestions(txtPath)).rejects.toThrow('Unsupported dataset format ".txt"');
  });
});
