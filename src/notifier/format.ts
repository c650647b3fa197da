import { AlertCandidate, LevelAlert, LevelMetric } from '../alerts/types';
import { AlertMessage } from './types';

const METRIC_LABELS: Record<LevelMetric, string> = {
  gamma: 'Gamma',
  vega: 'Vega',
  dvol: 'DVOL',
};

const METRIC_DECIMALS: Record<LevelMetric, number> = {
  gamma: 8,
  vega: 2,
  dvol: 2,
};

function signed(value: number, decimals: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(decimals)}`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function formatLevel(alert: LevelAlert): AlertMessage {
  const label = METRIC_LABELS[alert.metric];
  const decimals = METRIC_DECIMALS[alert.metric];
  const severity = capitalize(alert.severity);
  const value = alert.value.toFixed(decimals);
  const threshold = alert.threshold.toFixed(decimals);

  const lines: string[] = [];
  if (alert.position) {
    lines.push(
      `Instrument: ${alert.position.instrumentName}`,
      `Direction: ${alert.position.direction.toUpperCase()}`,
      `Size: ${alert.position.size}`
    );
  }
  lines.push(
    `Current ${label}: ${value}`,
    `Severity: ${severity}`,
    `Threshold: ${threshold}`,
    `${label} has reached the ${alert.severity} alert level`
  );

  return {
    title: alert.position
      ? `${label} ${severity} Alert - ${alert.position.instrumentName}`
      : `${label} ${severity} Level Alert`,
    message: lines.join('\n'),
    detail: {
      Severity: severity,
      [`Current ${label}`]: value,
      Threshold: threshold,
    },
  };
}

/**
 * Renders an alert candidate as a title, message body and detail map.
 */
export function formatAlert(alert: AlertCandidate): AlertMessage {
  switch (alert.type) {
    case 'level':
      return formatLevel(alert);

    case 'specificValue': {
      const low = (alert.target - alert.tolerance).toFixed(2);
      const high = (alert.target + alert.tolerance).toFixed(2);
      const lines = [
        `DVOL: ${alert.value.toFixed(2)}`,
        `Target: ${alert.target}`,
        `Band: ${low} ~ ${high}`,
      ];
      if (alert.previous !== undefined) {
        lines.push(`Previous: ${alert.previous.toFixed(2)}`);
      }
      return {
        title: `DVOL Target Alert - ${alert.target}`,
        message: lines.join('\n'),
        detail: {
          'Current DVOL': alert.value.toFixed(2),
          Target: String(alert.target),
          Tolerance: `±${alert.tolerance.toFixed(2)}`,
        },
      };
    }

    case 'trend': {
      const pct = `${signed(alert.pctChange * 100, 2)}%`;
      const abs = signed(alert.absChange, 2);
      return {
        title: 'DVOL Move Alert',
        message: [
          `DVOL: ${alert.current.toFixed(2)}`,
          `${alert.windowMinutes}m ago: ${alert.previous.toFixed(2)}`,
          `Change: ${pct} (${abs})`,
          `Limits: ${(alert.pctLimit * 100).toFixed(2)}% or ${alert.absLimit.toFixed(2)} points`,
        ].join('\n'),
        detail: {
          Change: `${pct} (${abs})`,
          Limits: `${(alert.pctLimit * 100).toFixed(2)}% / ${alert.absLimit.toFixed(2)}`,
        },
      };
    }
  }
}
