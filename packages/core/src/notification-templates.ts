/**
 * Notification templates for GasGuard alert messages.
 * Rendered into plain text for the messaging channel.
 */

import { AlertStatus, type Metric, type ThresholdBand } from './types.js';

export interface NotificationTemplate {
  id: string;
  name: string;
  body: string;
  variables: string[];
}

// Variable interpolation: {{variableName}}
export function renderTemplate(template: NotificationTemplate, vars: Record<string, string>): string {
  let body = template.body;

  for (const [key, value] of Object.entries(vars)) {
    const pattern = new RegExp(`\\{\\{${key}\\}\\}`, 'g');
    body = body.replace(pattern, value);
  }

  return body;
}

// --- Gas ---

export const GAS_ALERT: NotificationTemplate = {
  id: 'gas-alert',
  name: 'Gas Alert',
  body: 'GAS ALERT!\n==============\nGas level exceeded!\nCurrent: {{value}}\nThreshold: {{threshold}}\n==============\nCheck environment immediately!',
  variables: ['value', 'threshold'],
};

export const GAS_ALERT_CLEARED: NotificationTemplate = {
  id: 'gas-alert-cleared',
  name: 'Gas Alert Cleared',
  body: 'GAS ALERT CLEARED\n==============\nGas level is normal\nCurrent: {{value}}\nClear level: {{threshold}}',
  variables: ['value', 'threshold'],
};

// --- Temperature ---

export const TEMPERATURE_ALERT: NotificationTemplate = {
  id: 'temperature-alert',
  name: 'High Temperature Alert',
  body: 'HIGH TEMP ALERT!\n==============\nTemperature too high!\nCurrent: {{value}}\nThreshold: {{threshold}}\n==============\nCheck environment!',
  variables: ['value', 'threshold'],
};

export const TEMPERATURE_ALERT_CLEARED: NotificationTemplate = {
  id: 'temperature-alert-cleared',
  name: 'Temperature Alert Cleared',
  body: 'TEMP ALERT CLEARED\n==============\nTemperature is normal\nCurrent: {{value}}\nClear level: {{threshold}}',
  variables: ['value', 'threshold'],
};

// --- Humidity ---

export const HUMIDITY_ALERT: NotificationTemplate = {
  id: 'humidity-alert',
  name: 'High Humidity Alert',
  body: 'HUMIDITY ALERT!\n==============\nHumidity too high!\nCurrent: {{value}}\nThreshold: {{threshold}}\n==============\nCheck ventilation!',
  variables: ['value', 'threshold'],
};

export const HUMIDITY_ALERT_CLEARED: NotificationTemplate = {
  id: 'humidity-alert-cleared',
  name: 'Humidity Alert Cleared',
  body: 'HUMIDITY ALERT CLEARED\n==============\nHumidity is normal\nCurrent: {{value}}\nClear level: {{threshold}}',
  variables: ['value', 'threshold'],
};

export const ALERT_TEMPLATES: Record<Metric, { triggered: NotificationTemplate; resolved: NotificationTemplate }> = {
  gas: { triggered: GAS_ALERT, resolved: GAS_ALERT_CLEARED },
  temperature: { triggered: TEMPERATURE_ALERT, resolved: TEMPERATURE_ALERT_CLEARED },
  humidity: { triggered: HUMIDITY_ALERT, resolved: HUMIDITY_ALERT_CLEARED },
};

export function formatMeasurement(value: number, unit: string): string {
  return `${value}${unit}`;
}

/**
 * Render the alert message for a metric transition. Only TRIGGERED and
 * RESOLVED produce a message.
 */
export function renderAlertMessage(
  metric: Metric,
  status: AlertStatus,
  value: number,
  band: ThresholdBand,
): string | null {
  const templates = ALERT_TEMPLATES[metric];
  if (status === AlertStatus.TRIGGERED) {
    return renderTemplate(templates.triggered, {
      value: formatMeasurement(value, band.unit),
      threshold: formatMeasurement(band.triggerHigh, band.unit),
    });
  }
  if (status === AlertStatus.RESOLVED) {
    return renderTemplate(templates.resolved, {
      value: formatMeasurement(value, band.unit),
      threshold: formatMeasurement(band.clearLow, band.unit),
    });
  }
  return null;
}
