import { InactiveCandidate } from '../types/index.js';

export interface RenderedMessage {
  subject: string;
  body: string;
}

const SIGN_OFF = ['Best regards,', 'The LMS Team'];

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function pluralDays(days: number): string {
  return days === 1 ? '1 day' : `${days} days`;
}

/**
 * Inactivity notice for one candidate. Users who never logged in get an
 * invitation to start instead of a last-activity date.
 */
export function renderInactivityMessage(candidate: InactiveCandidate, subject: string): RenderedMessage {
  const { record, inactivity } = candidate;
  const lines = [`Hello ${record.name},`, ''];

  if (inactivity.kind === 'never_active' || record.lastActive === null) {
    lines.push(
      "We've noticed that you haven't started your courses yet.",
      '',
      'Please log in to begin your learning journey!'
    );
  } else {
    lines.push(
      `We've noticed that you haven't been active in your courses for ${pluralDays(inactivity.days)}.`,
      `Your last activity was on ${isoDate(record.lastActive)}.`,
      '',
      'Please log in to continue your learning journey!'
    );
  }

  lines.push('', ...SIGN_OFF);
  return { subject, body: `${lines.join('\n')}\n` };
}

/**
 * Text stored with the notification record once a notice is delivered
 */
export function notificationRecordMessage(sentAt: Date): string {
  return `Inactivity notification sent on ${isoDate(sentAt)}`;
}
