import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidResponseError } from './errors';
import type {
    DayEnergy,
    DeviceInsight,
    EnergyConsumptionMetrics,
    EnergyHistory,
    HomePowerMetrics,
    PowerMetrics,
    PowerTimeSeries,
    RawConsumptionSeries,
    RawDeviceRunData,
    RawHistory,
    RawHomeRunData,
    RawInsight,
    RawPowerSeries,
    RawWeeklyEnergy,
    WeeklyEnergy,
} from './model';
import { collectTimestamps, pointAt, timestampToDate } from './utils';

/**
 * Validate `data` against `schema`, raising {@link InvalidResponseError}
 * with the failing paths when it does not match.
 */
export function parsePayload<Output, Input>(
    schema: ZodType<Output, ZodTypeDef, Input>,
    data: unknown,
    what: string
): Output {
    const result = schema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new InvalidResponseError(`Unexpected ${what} payload`, issues);
    }
    return result.data;
}

export function toPowerTimeSeries(raw: RawPowerSeries): PowerTimeSeries {
    const timestamps = collectTimestamps([
        raw.solarPowerDps,
        raw.batteryPowerDps,
        raw.gridPowerDps,
        raw.meterPowerDps,
        raw.homePowerDps,
        raw.epsPowerDps,
    ]);

    return {
        metrics: timestamps.map((timestamp) => ({
            timestamp: timestampToDate(timestamp),
            solar: pointAt(raw.solarPowerDps, timestamp),
            battery: pointAt(raw.batteryPowerDps, timestamp),
            grid: pointAt(raw.gridPowerDps, timestamp),
            meter: pointAt(raw.meterPowerDps, timestamp),
            home: pointAt(raw.homePowerDps, timestamp),
            eps: pointAt(raw.epsPowerDps, timestamp),
        })),
    };
}

export function toPowerMetrics(raw: RawDeviceRunData, now: Date = new Date()): PowerMetrics {
    const metrics: PowerMetrics = {
        timestamp: now,
        solar: raw.solarPower ?? null,
        battery: raw.batteryPower ?? null,
        grid: raw.gridPower ?? null,
        meter: raw.meterPower ?? null,
        home: raw.homePower ?? null,
        eps: raw.epsPower ?? null,
    };
    if (raw.batterySoc !== null && raw.batterySoc !== undefined) {
        metrics.batterySoc = raw.batterySoc;
    }
    return metrics;
}

export function toHomePowerMetrics(raw: RawHomeRunData, now: Date = new Date()): HomePowerMetrics {
    return {
        ...toPowerMetrics(raw, now),
        charge: raw.chargePower ?? null,
        batteries: (raw.batterySocList ?? []).map((battery) => ({
            serial: battery.deviceSn,
            soc: battery.batterySoc,
            runMode: battery.sysRunMode ?? null,
            hasSolar: battery.isExistSolar ?? null,
            powerConfig: battery.sysPowerConfig ?? null,
        })),
    };
}

export function toEnergyHistory(raw: RawHistory): EnergyHistory {
    return {
        energyConsumption: raw.energyConsumption,
        solarPercent: raw.solarPercent,
        metrics: collectTimestamps([raw.homeEnergyDps]).map((timestamp) => ({
            timestamp: timestampToDate(timestamp),
            energy: pointAt(raw.homeEnergyDps, timestamp),
        })),
    };
}

function toEnergyTimeseries(raw: RawConsumptionSeries): EnergyConsumptionMetrics[] {
    const timestamps = collectTimestamps([
        raw.homeEnergyDps,
        raw.fromBatteryDps,
        raw.toBatteryDps,
        raw.fromGridDps,
        raw.toGridDps,
        raw.fromSolarDps,
        raw.epsDps,
        raw.selfPoweredDps,
    ]);

    return timestamps.map((timestamp) => ({
        timestamp: timestampToDate(timestamp),
        consumption: pointAt(raw.homeEnergyDps, timestamp),
        fromBattery: pointAt(raw.fromBatteryDps, timestamp),
        toBattery: pointAt(raw.toBatteryDps, timestamp),
        fromGrid: pointAt(raw.fromGridDps, timestamp),
        toGrid: pointAt(raw.toGridDps, timestamp),
        fromSolar: pointAt(raw.fromSolarDps, timestamp),
        eps: pointAt(raw.epsDps, timestamp),
        selfPowered: pointAt(raw.selfPoweredDps, timestamp),
    }));
}

export function toDeviceInsight(raw: RawInsight): DeviceInsight {
    const statistics = raw.deviceStatisticsDto;

    return {
        selfPowered: raw.selfPowered ?? null,
        powerTimeseries: raw.deviceRealtimeDto ? toPowerTimeSeries(raw.deviceRealtimeDto) : null,
        energyStatistics: statistics
            ? {
                  consumption: statistics.consumptionEnergy,
                  fromBattery: statistics.fromBattery,
                  toBattery: statistics.toBattery,
                  fromGrid: statistics.fromGrid,
                  toGrid: statistics.toGrid,
                  fromSolar: statistics.fromSolar,
                  eps: statistics.eps,
              }
            : null,
        energyTimeseries: raw.insightConsumptionDataDto ? toEnergyTimeseries(raw.insightConsumptionDataDto) : null,
    };
}

export function toWeeklyEnergy(raw: RawWeeklyEnergy): WeeklyEnergy {
    const days: DayEnergy[] = Object.entries(raw.weekEnergy)
        .map(([key, energy]) => ({
            day: Number(key),
            solarEnergy: energy.solarEnergy,
            gridEnergy: energy.gridEnergy,
            toGrid: energy.toGrid,
            homeEnergy: energy.homeEnergy,
            selfPowered: energy.selfPowered,
            carbonEmissions: raw.carbonEmissionsWeekEnergy?.[key]?.carbonEmissions ?? null,
            saveStandardCoal: raw.saveStandardCoalWeekEnergy?.[key]?.saveStandardCoal ?? null,
        }))
        .sort((a, b) => a.day - b.day);

    return {
        today: raw.today,
        lastWeekTotalSolar: raw.lastWeekTotalSolar,
        lastWeekTotalGrid: raw.lastWeekTotalGrid,
        lastWeekTotalCarbonEmissions: raw.lastWeekTotalCarbonEmissions,
        lastWeekTotalSaveStandardCoal: raw.lastWeekTotalSaveStandardCoal,
        days,
    };
}
