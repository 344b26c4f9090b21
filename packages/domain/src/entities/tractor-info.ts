export interface TractorInfo {
  readonly manufacturer: string;
  readonly model: string;
  readonly year: string;
  readonly serialNumber: string;
  readonly engineType: string;
  readonly horsepower?: number;
  readonly operatingHours: number;
  readonly lastMaintenance?: Date;
}

export const UNKNOWN_TRACTOR: TractorInfo = {
  manufacturer: 'Unknown',
  model: 'Unknown',
  year: 'Unknown',
  serialNumber: 'Unknown',
  engineType: 'Unknown',
  operatingHours: 0,
};
