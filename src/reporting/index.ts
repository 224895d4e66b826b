import { IReporter } from '../core/interfaces/IReporter';
import { ReportFormat } from '../types/enums';
import { ConsoleReporter } from './ConsoleReporter';
import { JsonReporter } from './JsonReporter';

export * from './ConsoleReporter';
export * from './JsonReporter';
export * from './RecommendationEngine';

export function createReporter(format: ReportFormat): IReporter {
  switch (format) {
    case ReportFormat.JSON:
      return new JsonReporter();
    case ReportFormat.CONSOLE:
      return new ConsoleReporter();
  }
}
