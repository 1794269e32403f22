import { Classification, SupportLine, Theme, TicketPriority, isFaqTheme } from './ticket-model';

export interface RoutingConfig {
  /** Themes that always go to expert support. */
  escalateToLine3Themes: readonly Theme[];
  /** Themes that always go to technical support. */
  escalateToLine2Themes: readonly Theme[];
}

export const DEFAULT_ROUTING_CONFIG: RoutingConfig = {
  escalateToLine3Themes: ['critical-system-failure'],
  escalateToLine2Themes: ['system-failure', 'configuration', 'network', 'security'],
};

const PRIORITY_TO_LINE: Record<TicketPriority, SupportLine> = {
  critical: 3,
  high: 2,
  medium: 1,
  low: 1,
};

/**
 * Pick the support line for a classified request. First match wins:
 *
 * 1. FAQ theme → 1, whatever the priority
 * 2. critical priority → 3
 * 3. theme in `escalateToLine3Themes` → 3
 * 4. theme in `escalateToLine2Themes` → 2
 * 5. otherwise by priority
 */
export function routeTicket(classification: Classification, config: RoutingConfig = DEFAULT_ROUTING_CONFIG): SupportLine {
  if (isFaqTheme(classification.theme)) return 1;
  if (classification.priority === 'critical') return 3;
  if (config.escalateToLine3Themes.includes(classification.theme)) return 3;
  if (config.escalateToLine2Themes.includes(classification.theme)) return 2;
  return PRIORITY_TO_LINE[classification.priority];
}

export function nextSupportLine(line: SupportLine): SupportLine | null {
  switch (line) {
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      return null;
  }
}
