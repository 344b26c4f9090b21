import type { ChannelDefinition } from '@agri-telemetry/domain';

/** Channel catalog of the simulated "EduDemo 2025" tractor. */
export const TRACTOR_CHANNELS: readonly ChannelDefinition[] = [
  {
    name: 'engine_rpm',
    label: 'Engine RPM',
    unit: 'rpm',
    seedValue: 1500,
    minValue: 800,
    maxValue: 2400,
    warningThreshold: 2200,
    criticalThreshold: 2350,
    alertDirection: 'high',
    description: 'Engine rotational speed',
    profile: { kind: 'periodic', base: 1500, amplitude: 200, frequency: 0.1, sigma: 25 },
  },
  {
    name: 'engine_temp',
    label: 'Engine Temperature',
    unit: '°C',
    seedValue: 85,
    minValue: 60,
    maxValue: 120,
    warningThreshold: 105,
    criticalThreshold: 115,
    alertDirection: 'high',
    description: 'Engine block temperature',
    profile: {
      kind: 'exponential',
      driver: 'engine_load',
      targetBase: 80,
      targetGain: 25,
      driverScale: 100,
      rate: 0.05,
      sigma: 0.5,
    },
    dependsOn: ['engine_load'],
  },
  {
    name: 'engine_load',
    label: 'Engine Load',
    unit: '%',
    seedValue: 25,
    minValue: 0,
    maxValue: 100,
    warningThreshold: 90,
    criticalThreshold: 95,
    alertDirection: 'high',
    description: 'Engine load percentage',
    profile: { kind: 'periodic', base: 25, amplitude: 15, frequency: 0.08, sigma: 5 },
  },
  {
    name: 'vehicle_speed',
    label: 'Vehicle Speed',
    unit: 'km/h',
    seedValue: 12,
    minValue: 0,
    maxValue: 50,
    description: 'Current vehicle speed',
    profile: { kind: 'periodic', base: 12, amplitude: 8, frequency: 0.05, sigma: 2 },
  },
  {
    name: 'fuel_level',
    label: 'Fuel Level',
    unit: '%',
    seedValue: 75,
    minValue: 0,
    maxValue: 100,
    warningThreshold: 20,
    criticalThreshold: 10,
    alertDirection: 'low',
    description: 'Fuel tank level',
    profile: { kind: 'decay', maxDrainPerTick: 0.01 },
  },
  {
    name: 'hydraulic_pressure',
    label: 'Hydraulic Pressure',
    unit: 'psi',
    seedValue: 2000,
    minValue: 1000,
    maxValue: 3000,
    warningThreshold: 2800,
    criticalThreshold: 2900,
    alertDirection: 'high',
    description: 'Main hydraulic system pressure',
    profile: { kind: 'periodic', base: 2000, amplitude: 0, frequency: 0, sigma: 50 },
  },
  {
    name: 'pto_speed',
    label: 'PTO Speed',
    unit: 'rpm',
    seedValue: 540,
    minValue: 0,
    maxValue: 1000,
    description: 'Power Take-Off speed',
    profile: { kind: 'bursty', activeProbability: 0.2, nominal: 540, sigma: 10 },
  },
  {
    name: 'coolant_temp',
    label: 'Coolant Temperature',
    unit: '°C',
    seedValue: 82,
    minValue: 60,
    maxValue: 110,
    warningThreshold: 100,
    criticalThreshold: 105,
    alertDirection: 'high',
    description: 'Engine coolant temperature',
    profile: {
      kind: 'exponential',
      driver: 'engine_load',
      targetBase: 75,
      targetGain: 20,
      driverScale: 100,
      rate: 0.04,
      sigma: 0.3,
    },
    dependsOn: ['engine_load'],
  },
  {
    name: 'transmission_temp',
    label: 'Transmission Temperature',
    unit: '°C',
    seedValue: 75,
    minValue: 40,
    maxValue: 120,
    warningThreshold: 100,
    criticalThreshold: 110,
    alertDirection: 'high',
    description: 'Transmission oil temperature',
    profile: {
      kind: 'exponential',
      driver: 'engine_load',
      targetBase: 65,
      targetGain: 30,
      driverScale: 100,
      rate: 0.02,
      sigma: 0.3,
    },
    dependsOn: ['engine_load'],
  },
  {
    name: 'latitude',
    label: 'Latitude',
    unit: '°',
    seedValue: 40.7128,
    description: 'GPS latitude coordinate',
    profile: { kind: 'random-walk', sigma: 0.00001 },
  },
  {
    name: 'longitude',
    label: 'Longitude',
    unit: '°',
    seedValue: -74.006,
    description: 'GPS longitude coordinate',
    profile: { kind: 'random-walk', sigma: 0.00001 },
  },
];
