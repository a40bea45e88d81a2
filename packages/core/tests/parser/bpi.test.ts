import { describe, it, expect } from 'vitest';
import { parseBpi, parseBpiTextPage, extractBpiMetadata } from '../../src/parser/bpi.js';
import { createMemoryDocument } from '../../src/document/memory.js';

describe('parseBpi', () => {
    const headerText = [
        'BPI Statement of Account',
        'Account Number: 1234-5678-90',
        'Account Name: Maria Santos',
        'Statement Period: Nov 1, 2024 - Nov 30, 2024',
    ].join('\n');

    it('parses table rows', () => {
        const doc = createMemoryDocument('bpi_nov.pdf', [{
            text: headerText,
            tables: [[
                ['Date', 'Description', 'Debit', 'Credit', 'Balance'],
                ['11/05/2024', 'ATM WITHDRAWAL', '2,000.00', '', '8,000.00'],
                ['11/10/2024', 'SALARY CREDIT', '', '25,000.00', '33,000.00'],
            ]],
        }]);

        const result = parseBpi(doc);

        expect(result.source_kind).toBe('bpi');
        expect(result.transactions.map(t => [t.date, t.description, t.amount])).toEqual([
            ['2024-11-05', 'ATM WITHDRAWAL', '-2000'],
            ['2024-11-10', 'SALARY CREDIT', '25000'],
        ]);
        expect(result.account_number).toBe('****7890');
        expect(result.account_holder).toBe('Maria Santos');
        expect(result.period_start).toBe('2024-11-01');
        expect(result.period_end).toBe('2024-11-30');
        expect(result.opening_balance).toBe('10000');
        expect(result.closing_balance).toBe('33000');
        expect(result.quality_score).toBe(1);
        expect(result.warnings).toEqual([]);
    });

    it('falls back to text lines when there are no tables', () => {
        const doc = createMemoryDocument('bpi_sept.pdf', [{
            text: [
                'BPI',
                'PERIOD COVERED Sep 01, 2024 - Sep 30, 2024',
                'Sep 29 INSTAPAY TRANSFER 1,000.00 5,230.50',
                'Sep 30 INTEREST EARNED 12.34 5,242.84',
                'Sep 30 TAX WITHHELD 2.47 5,240.37',
            ].join('\n'),
        }]);

        const result = parseBpi(doc);

        expect(result.transactions).toEqual([
            { date: '2024-09-29', description: 'INSTAPAY TRANSFER', amount: '-1000', confidence: 0.9 },
            { date: '2024-09-30', description: 'INTEREST EARNED', amount: '12.34', confidence: 0.9 },
            { date: '2024-09-30', description: 'TAX WITHHELD', amount: '-2.47', confidence: 0.9 },
        ]);
        expect(result.warnings).toEqual([
            'No usable transaction tables; parsed statement text lines instead',
            'Could not extract account number from statement',
        ]);
        expect(result.opening_balance).toBeUndefined();
        expect(result.quality_score).toBeCloseTo(0.85, 5);
    });

    it('keeps the table errors when the text yields nothing either', () => {
        const doc = createMemoryDocument('bpi.pdf', [{
            text: headerText,
            tables: [[['not-a-date', 'X', '1', '', '']]],
        }]);

        const result = parseBpi(doc);

        expect(result.transactions).toEqual([]);
        expect(result.parsing_errors).toEqual(['Page 1, row 1: Invalid date format: not-a-date']);
        expect(result.warnings).toEqual([]);
    });
});

describe('parseBpiTextPage', () => {
    it('uses the default year without a period line', () => {
        const result = parseBpiTextPage('Jan 05 BILLS PAYMENT MERALCO 1,500.00 3,500.00', 2, 2023);

        expect(result.transactions).toEqual([
            { date: '2023-01-05', description: 'BILLS PAYMENT MERALCO', amount: '-1500', confidence: 0.9 },
        ]);
    });

    it('keeps the printed sign for unrecognized descriptions', () => {
        const result = parseBpiTextPage('Mar 03 DEPOSIT 250.00 750.00', 1, 2024);
        expect(result.transactions[0].amount).toBe('250');
    });

    it('ignores lines without an amount and balance', () => {
        expect(parseBpiTextPage('Feb 01 BALANCE FORWARD 1,000.00', 1, 2024).transactions).toEqual([]);
    });

    it('reports impossible dates with the page and line', () => {
        const result = parseBpiTextPage('header\nFeb 30 CASH IN 1.00 2.00', 3, 2024);

        expect(result.transactions).toEqual([]);
        expect(result.errors).toEqual(['Page 3, line 2: Invalid date: Feb 30 2024']);
    });
});

describe('extractBpiMetadata', () => {
    it('reads the period from a PERIOD COVERED line', () => {
        const metadata = extractBpiMetadata('PERIOD COVERED Aug 01, 2024 - Aug 31, 2024');
        expect(metadata.period_start).toBe('2024-08-01');
        expect(metadata.period_end).toBe('2024-08-31');
    });

    it('masks account numbers to the last four digits', () => {
        expect(extractBpiMetadata('Acct No. 0012 3456 7890').account_number).toBe('****7890');
    });
});
