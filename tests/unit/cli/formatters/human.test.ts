/**
 * Tests for the human-readable report formatter.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { HumanFormatter, LABEL_WIDTH, RULE_WIDTH } from '../../../../src/cli/formatters/human.js';
import { analyzePhoneNumber, type PhoneAnalysis } from '../../../../src/core/pipeline.js';
import { RISK_FACTORS } from '../../../../src/core/report/summary.js';
import type { ReportSummary } from '../../../../src/core/report/types.js';
import { ErrorCodes, InvalidInputError } from '../../../../src/utils/errors.js';
import { createFakeLookup, LONDON_LOOKUP } from '../../../helpers/fake-lookup.js';

function field(label: string, value: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)}: ${value}`;
}

describe('HumanFormatter', () => {
  let analysis: PhoneAnalysis;

  beforeAll(async () => {
    analysis = await analyzePhoneNumber('+442079460958', { lookup: createFakeLookup(LONDON_LOOKUP) });
  });

  describe('formatReport', () => {
    it('should open with the report title between rules', () => {
      const lines = new HumanFormatter({ colors: false }).formatReport(analysis.report).split('\n');

      expect(lines.slice(0, 6)).toEqual([
        '═'.repeat(RULE_WIDTH),
        '📞 PHONE NUMBER ANALYSIS REPORT',
        '═'.repeat(RULE_WIDTH),
        '',
        '📱 NUMBER_FORMATS',
        '─'.repeat(17),
      ]);
      expect(lines[6]).toBe(field('Input', '+442079460958'));
    });

    it('should print categories in order', () => {
      const lines = new HumanFormatter({ colors: false }).formatReport(analysis.report).split('\n');
      const headers = lines.filter((line) => /^\S+ [A-Z_]+$/.test(line));

      expect(headers).toEqual([
        '📱 NUMBER_FORMATS',
        '✅ VALIDATION',
        '🔢 STRUCTURE',
        '🌍 GEOGRAPHIC_INFO',
        '🕐 TIMEZONE_INFO',
        '📡 SERVICE_INFO',
        '⚙️ TECHNICAL_DATA',
        '📋 EXAMPLES',
      ]);
    });

    it('should render each kind of value', () => {
      const lines = new HumanFormatter({ colors: false }).formatReport(analysis.report).split('\n');

      expect(lines).toContain(field('E164', '+442079460958'));
      expect(lines).toContain(field('RFC3966', 'tel:+442079460958'));
      expect(lines).toContain(field('Is Valid', '✅ Yes'));
      expect(lines).toContain(field('Has Extension', '❌ No'));
      expect(lines).toContain(field('National Number Length', '10'));
      expect(lines).toContain(field('Associated Regions', 'GB, GG, IM, JE'));
      expect(lines).toContain(field('Carrier Name', 'unknown'));
    });
  });

  describe('formatSummary', () => {
    it('should summarize a low-risk number', () => {
      const output = new HumanFormatter({ colors: false }).formatSummary(analysis.report, analysis.summary);

      expect(output.split('\n')).toEqual([
        '═'.repeat(RULE_WIDTH),
        '📋 QUICK SUMMARY',
        '═'.repeat(RULE_WIDTH),
        `📊 Total Data Points: ${analysis.summary.total_data_points}`,
        '✅ Number Valid: Yes',
        '🌍 Location: London',
        '🏆 Confidence Score: 80%',
        '⚠️  Risk Level: 🟢 LOW',
        '═'.repeat(RULE_WIDTH),
      ]);
    });

    it('should list risk factors', () => {
      const summary: ReportSummary = {
        ...analysis.summary,
        risk_assessment: {
          risk_level: 'MEDIUM',
          risk_factors: [RISK_FACTORS.VOIP],
          is_safe_to_call: true,
        },
      };
      const lines = new HumanFormatter({ colors: false }).formatSummary(analysis.report, summary).split('\n');

      expect(lines).toContain('⚠️  Risk Level: 🟡 MEDIUM');
      expect(lines).toContain('⚠️  Risk Factors:');
      expect(lines).toContain(`     • ${RISK_FACTORS.VOIP}`);
    });
  });

  describe('formatAnalysis', () => {
    it('should put the summary after the report', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatAnalysis(analysis)).toBe(
        `${formatter.formatReport(analysis.report)}\n\n${formatter.formatSummary(analysis.report, analysis.summary)}`
      );
    });
  });

  describe('formatInvalidInput', () => {
    it('should show the reason', () => {
      const error = new InvalidInputError(ErrorCodes.UNPARSABLE_NUMBER, 'Unknown or missing country calling code');

      expect(new HumanFormatter({ colors: false }).formatInvalidInput(error)).toBe(
        '❌ Invalid input: Unknown or missing country calling code'
      );
    });
  });

  describe('formatValue', () => {
    it('should dim the placeholder when colors are on', () => {
      expect(new HumanFormatter().formatValue('unknown')).toBe(chalk.dim('unknown'));
    });

    it('should print plain values without colors', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatValue('unknown')).toBe('unknown');
      expect(formatter.formatValue(false)).toBe('❌ No');
      expect(formatter.formatValue(3)).toBe('3');
      expect(formatter.formatValue(['Europe/London', 'Europe/Dublin'])).toBe('Europe/London, Europe/Dublin');
    });
  });
});
