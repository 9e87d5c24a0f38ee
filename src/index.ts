export * from './lib/errors'
export * from './lib/peakList'
export * from './lib/fractions'
export * from './lib/retentionIndex'
export * from './lib/internalStandard'
export * from './lib/blankAverage'
export * from './lib/concentration'
export * from './lib/calibration'
export * from './lib/config'
export * from './lib/massHunterReport'
export * from './lib/tableText'
export * from './lib/csvWriter'
export * from './lib/batch'
