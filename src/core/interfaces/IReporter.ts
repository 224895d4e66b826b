import { ReportFormat } from '../../types/enums';
import { AuditReport } from '../../types/report';

/**
 * Renders a finished report
 */
export interface IReporter {
  readonly format: ReportFormat;

  render(report: AuditReport): string;
}
