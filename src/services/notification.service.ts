/**
 * Notification port
 *
 * The engine announces bookings, reschedules and cancellations; delivery
 * (email, SMS) belongs to whoever implements NotificationSender. Sending is
 * fire-and-forget: a failed delivery is logged and never affects the
 * scheduling result.
 */

import { Logger } from '../lib/logger';

export enum NotificationEventType {
  BOOKED = 'appointment.booked',
  RESCHEDULED = 'appointment.rescheduled',
  CANCELLED = 'appointment.cancelled',
}

export interface NotificationEvent {
  appointmentId: string;
  customerId: string;
  eventType: NotificationEventType;
  /** ISO timestamp of the new start; set for bookings and reschedules */
  newStart?: string;
}

export interface NotificationSender {
  send(event: NotificationEvent): Promise<void>;
}

/** Default sender: writes the event to the log */
export class LoggingNotificationSender implements NotificationSender {
  constructor(private readonly log: Logger) {}

  async send(event: NotificationEvent): Promise<void> {
    this.log.info({ event }, 'Notification event');
  }
}

/**
 * Hands the event to the sender without waiting for delivery.
 * Returns the delivery promise for callers that want to await it (tests).
 */
export function dispatchNotification(
  sender: NotificationSender,
  event: NotificationEvent,
  log: Logger
): Promise<void> {
  let delivery: Promise<void>;
  try {
    delivery = sender.send(event);
  } catch (err) {
    delivery = Promise.reject(err);
  }

  return delivery.catch((err: unknown) => {
    log.error({ err, event }, 'Notification delivery failed');
  });
}
