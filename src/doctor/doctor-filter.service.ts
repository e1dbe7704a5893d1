import { Injectable, Logger } from '@nestjs/common';
import { blankToUndefined } from '../common/query';
import { isInPeriod, isTimeOfDay, TimePeriod } from '../common/scheduling';
import { Doctor } from '../entities/doctor.entity';
import { DoctorService } from './doctor.service';

@Injectable()
export class DoctorFilterService {
  private readonly logger = new Logger(DoctorFilterService.name);

  constructor(private readonly doctorService: DoctorService) {}

  /**
   * Picks one query per combination of present filters. Name matches a
   * case-insensitive substring, specialty a case-insensitive equal value and
   * time any configured slot in that half of the day.
   */
  async filter(nameFilter?: string, specialtyFilter?: string, timePeriod?: TimePeriod): Promise<Doctor[]> {
    const name = blankToUndefined(nameFilter);
    const specialty = blankToUndefined(specialtyFilter);
    this.logger.debug(`Filtering doctors by name=${name}, specialty=${specialty}, time=${timePeriod}`);

    if (name && specialty && timePeriod) {
      return this.filterByTime(await this.doctorService.findByNameAndSpecialty(name, specialty), timePeriod);
    } else if (name && specialty) {
      return this.doctorService.findByNameAndSpecialty(name, specialty);
    } else if (name && timePeriod) {
      return this.filterByTime(await this.doctorService.findByName(name), timePeriod);
    } else if (specialty && timePeriod) {
      return this.filterByTime(await this.doctorService.findBySpecialty(specialty), timePeriod);
    } else if (name) {
      return this.doctorService.findByName(name);
    } else if (specialty) {
      return this.doctorService.findBySpecialty(specialty);
    } else if (timePeriod) {
      return this.filterByTime(await this.doctorService.findAll(), timePeriod);
    }
    return this.doctorService.findAll();
  }

  filterByTime(doctors: Doctor[], timePeriod: TimePeriod): Doctor[] {
    return doctors.filter((doctor) =>
      (doctor.availableTimes ?? []).some((slot) => isTimeOfDay(slot) && isInPeriod(slot, timePeriod))
    );
  }
}
