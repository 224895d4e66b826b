import { IReporter } from '../core/interfaces/IReporter';
import { ReportFormat } from '../types/enums';
import { AuditReport } from '../types/report';

/**
 * JSON rendering of the report data schema
 */
export class JsonReporter implements IReporter {
  public readonly format = ReportFormat.JSON;

  constructor(private readonly indent: number = 2) {}

  public render(report: AuditReport): string {
    return JSON.stringify(report, null, this.indent);
  }
}
