/**
 * Schemas of the ECOS API payloads and the objects the client returns.
 * Account entities (user, home, device) are mapped while parsing; the
 * metric payloads are parsed raw and shaped in `mapping.ts`.
 */
import { z } from 'zod';

// Identifiers are 19 digit numbers, sent as strings to stay exact. A number
// is only taken when JSON.parse cannot have rounded it.
const IdSchema = z
    .union([z.string(), z.number().int().refine(Number.isSafeInteger, 'Identifier exceeds the safe integer range')])
    .transform((value) => String(value));

const NumericCodeSchema = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]);

const EpochMillisSchema = z.number().transform((value) => new Date(value));

const NullableNumberSchema = z.number().nullish().transform((value) => value ?? null);

// =============================================================================
// Account
// =============================================================================

export const LoginDataSchema = z.object({
    accessToken: z.string(),
    refreshToken: z.string(),
});

export const UserSchema = z
    .object({
        username: z.string(),
        nickname: z.string().nullish(),
        email: z.string(),
        phone: z.string().nullish(),
        timeZoneId: z.union([z.string(), z.number()]),
        timeZone: z.string(),
        timezoneName: z.string(),
        datacenterPhoneCode: z.number(),
        datacenter: z.string(),
        datacenterHost: z.string(),
    })
    .transform((raw) => ({
        username: raw.username,
        nickname: raw.nickname ?? '',
        email: raw.email,
        phone: raw.phone ?? '',
        timezoneId: String(raw.timeZoneId),
        /** Offset such as `GMT-05:00`. */
        timezone: raw.timeZone,
        /** IANA name such as `America/Toronto`. */
        timezoneName: raw.timezoneName,
        datacenterPhoneCode: raw.datacenterPhoneCode,
        datacenter: raw.datacenter,
        datacenterHost: raw.datacenterHost,
    }));

export type User = z.output<typeof UserSchema>;

/** Name given to the virtual home holding devices shared from another account. */
export const SHARED_DEVICES_HOME_NAME = 'SHARED_DEVICES';

export const HomeSchema = z
    .object({
        homeId: IdSchema,
        homeName: z.string().nullish(),
        homeType: NumericCodeSchema,
        longitude: NullableNumberSchema,
        latitude: NullableNumberSchema,
        homeDeviceNumber: z.number(),
        relationType: z.number(),
        createTime: EpochMillisSchema,
        updateTime: EpochMillisSchema,
    })
    .transform((raw) => ({
        id: raw.homeId,
        name: raw.homeType === 0 ? SHARED_DEVICES_HOME_NAME : raw.homeName ?? '',
        type: raw.homeType,
        longitude: raw.longitude,
        latitude: raw.latitude,
        deviceNumber: raw.homeDeviceNumber,
        relationType: raw.relationType,
        createTime: raw.createTime,
        updateTime: raw.updateTime,
    }));

export type Home = z.output<typeof HomeSchema>;

export const DeviceSchema = z
    .object({
        deviceId: IdSchema,
        deviceAliasName: z.string(),
        state: z.number(),
        vpp: z.boolean(),
        type: z.number(),
        deviceSn: z.string(),
        agentId: z.string().nullish(),
        lon: z.number(),
        lat: z.number(),
        deviceType: z.string().nullish(),
        master: z.number(),
        batterySoc: z.number().nullish(),
        batteryPower: z.number().nullish(),
    })
    .transform((raw) => ({
        id: raw.deviceId,
        alias: raw.deviceAliasName,
        state: raw.state,
        vpp: raw.vpp,
        type: raw.type,
        serial: raw.deviceSn,
        agentId: raw.agentId ?? '',
        longitude: raw.lon,
        latitude: raw.lat,
        deviceType: raw.deviceType ?? null,
        master: raw.master,
        batterySoc: raw.batterySoc ?? undefined,
        batteryPower: raw.batteryPower ?? undefined,
    }));

export type Device = z.output<typeof DeviceSchema>;

// =============================================================================
// Raw metric payloads
// =============================================================================

/** Values keyed by unix timestamp in seconds. */
export const DataPointsSchema = z.record(z.string(), z.number().nullable());

export type DataPoints = z.infer<typeof DataPointsSchema>;

export const RawPowerSeriesSchema = z.object({
    solarPowerDps: DataPointsSchema.nullish(),
    batteryPowerDps: DataPointsSchema.nullish(),
    gridPowerDps: DataPointsSchema.nullish(),
    meterPowerDps: DataPointsSchema.nullish(),
    homePowerDps: DataPointsSchema.nullish(),
    epsPowerDps: DataPointsSchema.nullish(),
});

export type RawPowerSeries = z.infer<typeof RawPowerSeriesSchema>;

export const RawDeviceRunDataSchema = z.object({
    batterySoc: z.number().nullish(),
    batteryPower: z.number().nullish(),
    epsPower: z.number().nullish(),
    gridPower: z.number().nullish(),
    homePower: z.number().nullish(),
    meterPower: z.number().nullish(),
    solarPower: z.number().nullish(),
    sysRunMode: z.number().nullish(),
    isExistSolar: z.boolean().nullish(),
    sysPowerConfig: z.number().nullish(),
});

export type RawDeviceRunData = z.infer<typeof RawDeviceRunDataSchema>;

export const RawBatterySocSchema = z.object({
    deviceSn: z.string(),
    batterySoc: z.number(),
    sysRunMode: z.number().nullish(),
    isExistSolar: z.boolean().nullish(),
    sysPowerConfig: z.number().nullish(),
});

export const RawHomeRunDataSchema = z.object({
    batteryPower: z.number().nullish(),
    epsPower: z.number().nullish(),
    gridPower: z.number().nullish(),
    homePower: z.number().nullish(),
    meterPower: z.number().nullish(),
    solarPower: z.number().nullish(),
    chargePower: z.number().nullish(),
    batterySocList: z.array(RawBatterySocSchema).nullish(),
});

export type RawHomeRunData = z.infer<typeof RawHomeRunDataSchema>;

export const RawHistorySchema = z.object({
    energyConsumption: z.number(),
    solarPercent: z.number(),
    homeEnergyDps: DataPointsSchema.nullish(),
});

export type RawHistory = z.infer<typeof RawHistorySchema>;

export const RawStatisticsSchema = z.object({
    consumptionEnergy: z.number(),
    fromBattery: z.number(),
    toBattery: z.number(),
    fromGrid: z.number(),
    toGrid: z.number(),
    fromSolar: z.number(),
    eps: z.number(),
});

export const RawConsumptionSeriesSchema = z.object({
    fromBatteryDps: DataPointsSchema.nullish(),
    toBatteryDps: DataPointsSchema.nullish(),
    fromGridDps: DataPointsSchema.nullish(),
    toGridDps: DataPointsSchema.nullish(),
    fromSolarDps: DataPointsSchema.nullish(),
    homeEnergyDps: DataPointsSchema.nullish(),
    epsDps: DataPointsSchema.nullish(),
    selfPoweredDps: DataPointsSchema.nullish(),
});

export type RawConsumptionSeries = z.infer<typeof RawConsumptionSeriesSchema>;

export const RawInsightSchema = z.object({
    selfPowered: z.number().nullish(),
    deviceRealtimeDto: RawPowerSeriesSchema.nullish(),
    deviceStatisticsDto: RawStatisticsSchema.nullish(),
    insightConsumptionDataDto: RawConsumptionSeriesSchema.nullish(),
});

export type RawInsight = z.infer<typeof RawInsightSchema>;

const RawDayEnergySchema = z.object({
    solarEnergy: z.number(),
    gridEnergy: z.number(),
    toGrid: z.number(),
    homeEnergy: z.number(),
    selfPowered: z.number(),
});

export const RawWeeklyEnergySchema = z.object({
    today: z.number(),
    lastWeekTotalSolar: z.number(),
    lastWeekTotalGrid: z.number(),
    lastWeekTotalCarbonEmissions: z.number(),
    lastWeekTotalSaveStandardCoal: z.number(),
    weekEnergy: z.record(z.string(), RawDayEnergySchema),
    carbonEmissionsWeekEnergy: z.record(z.string(), z.object({ carbonEmissions: z.number() })).nullish(),
    saveStandardCoalWeekEnergy: z.record(z.string(), z.object({ saveStandardCoal: z.number() })).nullish(),
});

export type RawWeeklyEnergy = z.infer<typeof RawWeeklyEnergySchema>;

// =============================================================================
// Mapped metrics
// =============================================================================

/**
 * Instant power flows in watts. A value is `null` when the API did not
 * report it.
 */
export interface PowerMetrics {
    timestamp: Date;
    solar: number | null;
    battery: number | null;
    grid: number | null;
    /** Power measured at the grid meter, negative when exporting. */
    meter: number | null;
    home: number | null;
    eps: number | null;
    batterySoc?: number;
}

export interface BatteryStatus {
    serial: string;
    soc: number;
    runMode: number | null;
    hasSolar: boolean | null;
    powerConfig: number | null;
}

export interface HomePowerMetrics extends PowerMetrics {
    charge: number | null;
    batteries: BatteryStatus[];
}

export interface PowerTimeSeries {
    metrics: PowerMetrics[];
}

export interface EnergyMetric {
    timestamp: Date;
    energy: number | null;
}

export interface EnergyHistory {
    energyConsumption: number;
    solarPercent: number;
    metrics: EnergyMetric[];
}

export interface EnergyStatistics {
    consumption: number;
    fromBattery: number;
    toBattery: number;
    fromGrid: number;
    toGrid: number;
    fromSolar: number;
    eps: number;
}

export interface EnergyConsumptionMetrics {
    timestamp: Date;
    consumption: number | null;
    fromBattery: number | null;
    toBattery: number | null;
    fromGrid: number | null;
    toGrid: number | null;
    fromSolar: number | null;
    eps: number | null;
    selfPowered: number | null;
}

export interface DeviceInsight {
    selfPowered: number | null;
    powerTimeseries: PowerTimeSeries | null;
    energyStatistics: EnergyStatistics | null;
    energyTimeseries: EnergyConsumptionMetrics[] | null;
}

export interface DayEnergy {
    /** 1 to 7 */
    day: number;
    solarEnergy: number;
    gridEnergy: number;
    toGrid: number;
    homeEnergy: number;
    selfPowered: number;
    carbonEmissions: number | null;
    saveStandardCoal: number | null;
}

export interface WeeklyEnergy {
    today: number;
    lastWeekTotalSolar: number;
    lastWeekTotalGrid: number;
    lastWeekTotalCarbonEmissions: number;
    lastWeekTotalSaveStandardCoal: number;
    days: DayEnergy[];
}

// =============================================================================
// Request parameters
// =============================================================================

/**
 * Aggregation requested from the history endpoint.
 */
export enum HISTORY_PERIOD {
    /** Daily values of the calendar month holding the start date. */
    MONTH_DAILY = 0,
    /** Daily values of the last days up to today; start date ignored. */
    RECENT_DAILY = 1,
    /** Daily values of the current month; start date ignored. */
    CURRENT_MONTH_DAILY = 2,
    CURRENT_MONTH_DAILY_ALT = 3,
    /** Total of the current month; start date ignored. */
    CURRENT_MONTH_TOTAL = 4,
}

/**
 * Aggregation requested from the insight endpoint.
 */
export enum INSIGHT_PERIOD {
    /** 5-minute power of the calendar day. */
    DAY = 0,
    /** Daily energy of the calendar month. */
    MONTH = 2,
    /** Monthly energy of the calendar year. */
    YEAR = 4,
    /** Yearly energy. */
    LIFETIME = 5,
}
