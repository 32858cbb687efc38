import chalk from 'chalk';
import type { PhoneAnalysis } from '../../core/pipeline.js';
import {
  REPORT_CATEGORIES,
  UNKNOWN,
  categoryFields,
  type FieldValue,
  type ReportCategory,
  type ReportSummary,
  type PhoneReport,
  type RiskLevel,
} from '../../core/report/index.js';
import type { InvalidInputError } from '../../utils/errors.js';
import { toLabel } from '../../utils/string.js';
import type { IReportFormatter, FormatOptions } from './types.js';

export const RULE_WIDTH = 80;
export const LABEL_WIDTH = 30;

const CATEGORY_ICONS: Record<ReportCategory, string> = {
  NUMBER_FORMATS: '📱',
  VALIDATION: '✅',
  STRUCTURE: '🔢',
  GEOGRAPHIC_INFO: '🌍',
  TIMEZONE_INFO: '🕐',
  SERVICE_INFO: '📡',
  TECHNICAL_DATA: '⚙️',
  EXAMPLES: '📋',
};

const RISK_MARKERS: Record<RiskLevel, string> = {
  LOW: '🟢',
  MEDIUM: '🟡',
  HIGH: '🔴',
};

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'magenta' | 'dim' | 'bold';

/**
 * Human-readable report formatter.
 */
export class HumanFormatter implements IReportFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatAnalysis(analysis: PhoneAnalysis): string {
    return [
      this.formatReport(analysis.report),
      '',
      this.formatSummary(analysis.report, analysis.summary),
    ].join('\n');
  }

  formatReport(report: PhoneReport): string {
    const rule = this.colorize('═'.repeat(RULE_WIDTH), 'magenta');
    const lines: string[] = [
      rule,
      this.colorize('📞 PHONE NUMBER ANALYSIS REPORT', 'bold'),
      rule,
    ];

    for (const category of REPORT_CATEGORIES) {
      lines.push('');
      lines.push(this.colorize(`${CATEGORY_ICONS[category]} ${category}`, 'cyan'));
      lines.push('─'.repeat(category.length + 3));
      for (const [key, value] of Object.entries(categoryFields(report, category))) {
        lines.push(`  ${toLabel(key).padEnd(LABEL_WIDTH)}: ${this.formatValue(value)}`);
      }
    }

    return lines.join('\n');
  }

  formatSummary(report: PhoneReport, summary: ReportSummary): string {
    const rule = this.colorize('═'.repeat(RULE_WIDTH), 'magenta');
    const risk = summary.risk_assessment;
    const lines: string[] = [
      rule,
      this.colorize('📋 QUICK SUMMARY', 'bold'),
      rule,
      `📊 Total Data Points: ${summary.total_data_points}`,
      `✅ Number Valid: ${report.VALIDATION.is_valid ? 'Yes' : 'No'}`,
      `🌍 Location: ${this.formatValue(report.GEOGRAPHIC_INFO.primary_location)}`,
      `🏆 Confidence Score: ${summary.confidence_score}%`,
      `⚠️  Risk Level: ${RISK_MARKERS[risk.risk_level]} ${this.colorize(risk.risk_level, this.riskColor(risk.risk_level))}`,
    ];

    if (risk.risk_factors.length > 0) {
      lines.push('⚠️  Risk Factors:');
      for (const factor of risk.risk_factors) {
        lines.push(`     • ${factor}`);
      }
    }

    lines.push(rule);
    return lines.join('\n');
  }

  formatInvalidInput(error: InvalidInputError): string {
    return this.colorize(`❌ Invalid input: ${error.message}`, 'red');
  }

  formatValue(value: FieldValue): string {
    if (value === UNKNOWN) {
      return this.colorize(UNKNOWN, 'dim');
    }
    if (typeof value === 'boolean') {
      return value ? this.colorize('✅ Yes', 'green') : this.colorize('❌ No', 'red');
    }
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
    return value.join(', ');
  }

  private riskColor(level: RiskLevel): Color {
    return level === 'LOW' ? 'green' : level === 'MEDIUM' ? 'yellow' : 'red';
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.bold.cyan(text);
      case 'magenta':
        return chalk.magenta(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
