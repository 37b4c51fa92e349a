import { v4 as uuidv4 } from 'uuid';
import type { BaseLogger } from 'pino';
import { Appointment, TimeRange } from '../models.js';
import { FailoverStrategy } from '../strategies/FailoverStrategy.js';
import { KeyedMutex } from '../concurrency/KeyedMutex.js';
import { IRetailStore } from '../../infrastructure/stores/IRetailStore.js';
import {
  BackendUnavailableError,
  SlotConflictError,
  ValidationError,
} from '../errors/index.js';
import {
  contains,
  formatTimeRange,
  overlaps,
  parseTimeRange,
  validateDate,
} from '../timeRange.js';

export interface SchedulerConfig {
  openingHours: TimeRange;
  defaultSlotMinutes: number;
  // matched case-insensitively against the service type
  slotMinutesByKeyword: Record<string, number>;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  openingHours: { start: 9 * 60, end: 18 * 60 },
  defaultSlotMinutes: 60,
  slotMinutesByKeyword: { 'tune-up': 120 },
};

export class AppointmentService {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly backends: FailoverStrategy,
    private readonly logger: BaseLogger,
    private readonly config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
  ) {}

  slotMinutesFor(serviceType: string): number {
    const name = serviceType.toLowerCase();
    for (const [keyword, minutes] of Object.entries(this.config.slotMinutesByKeyword)) {
      if (name.includes(keyword.toLowerCase())) return minutes;
    }
    return this.config.defaultSlotMinutes;
  }

  /**
   * Slots of the service's length across the operating window, minus anything
   * touching a live booking. Sorted by start time.
   */
  async getAvailableTimes(serviceType: string, date: string): Promise<TimeRange[]> {
    const service = this.validateServiceType(serviceType);
    validateDate(date);

    const served = await this.backends.execute('getAvailableTimes', async (store, { peer }) => {
      const own = await store.listAppointments(service, date);
      const foreign = await this.foreignBookings(peer, own, service, date);
      return [...own.filter(a => a.status !== 'cancelled'), ...foreign];
    });
    const booked = served.value.map(a => a.timeRange);

    return [...this.candidateSlots(this.slotMinutesFor(service))].filter(
      slot => !booked.some(range => overlaps(slot, range))
    );
  }

  async scheduleService(
    customerId: string,
    serviceType: string,
    date: string,
    timeRange: string,
    details: string
  ): Promise<Appointment> {
    if (typeof customerId !== 'string' || customerId.trim().length === 0) {
      throw new ValidationError('Customer ID is required.');
    }
    const service = this.validateServiceType(serviceType);
    validateDate(date);
    const range = parseTimeRange(timeRange);

    if (!contains(this.config.openingHours, range)) {
      throw new ValidationError(
        `Time range ${formatTimeRange(range)} is outside operating hours ${formatTimeRange(this.config.openingHours)}.`
      );
    }

    const appointment: Appointment = {
      appointmentId: uuidv4(),
      customerId,
      serviceType: service,
      date,
      timeRange: range,
      details: details ?? '',
      status: 'scheduled',
      createdAt: new Date(),
    };

    const served = await this.locks.runExclusive(`${service}|${date}`, () =>
      this.backends.execute('scheduleService', async (store, { peer }) => {
        const own = peer ? await store.listAppointments(service, date) : [];
        const foreign = await this.foreignBookings(peer, own, service, date);
        return store.bookAppointment(appointment, existing => {
          const live = [...existing.filter(a => a.status !== 'cancelled'), ...foreign];
          if (live.some(a => overlaps(a.timeRange, range))) {
            throw new SlotConflictError(service, date, formatTimeRange(range));
          }
        });
      })
    );

    this.logger.info(
      {
        appointmentId: served.value.appointmentId,
        serviceType: service,
        date,
        timeRange: formatTimeRange(range),
        backend: served.backend,
      },
      'Appointment scheduled'
    );
    return served.value;
  }

  // history is kept: cancelling only flips the status
  async cancelAppointment(appointmentId: string): Promise<Appointment> {
    if (typeof appointmentId !== 'string' || appointmentId.trim().length === 0) {
      throw new ValidationError('Appointment ID is required.');
    }
    const served = await this.backends.execute('cancelAppointment', store =>
      store.cancelAppointment(appointmentId)
    );
    return served.value;
  }

  async listAppointments(customerId: string): Promise<Appointment[]> {
    if (typeof customerId !== 'string' || customerId.trim().length === 0) {
      throw new ValidationError('Customer ID is required.');
    }
    const served = await this.backends.execute('listAppointments', store =>
      store.listCustomerAppointments(customerId)
    );
    return served.value;
  }

  /**
   * Live bookings held only by the other backend. A slot taken there is taken
   * here too, even though the two stores are never reconciled. Entries this
   * backend also holds are skipped, so its own cancellations win.
   */
  private async foreignBookings(
    peer: IRetailStore | null,
    own: Appointment[],
    service: string,
    date: string
  ): Promise<Appointment[]> {
    if (!peer) return [];
    let theirs: Appointment[];
    try {
      theirs = await peer.listAppointments(service, date);
    } catch (error) {
      if (!(error instanceof BackendUnavailableError)) throw error;
      this.logger.warn(
        { err: error, serviceType: service, date },
        'Other backend unreadable; checking one store only'
      );
      return [];
    }
    const known = new Set(own.map(a => a.appointmentId));
    return theirs.filter(a => a.status !== 'cancelled' && !known.has(a.appointmentId));
  }

  private *candidateSlots(length: number): Generator<TimeRange> {
    const { start, end } = this.config.openingHours;
    for (let slotStart = start; slotStart + length <= end; slotStart += length) {
      yield { start: slotStart, end: slotStart + length };
    }
  }

  private validateServiceType(serviceType: string): string {
    const service = typeof serviceType === 'string' ? serviceType.trim() : '';
    if (service.length === 0) {
      throw new ValidationError('Service type is required.');
    }
    return service;
  }
}
