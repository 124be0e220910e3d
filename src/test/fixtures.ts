/**
 * Payloads shaped like the `data` field of ECOS API answers.
 */

export const TEST_LOGIN = 'test@example.com';
export const TEST_PASSWORD = 'test-password';
export const TEST_ACCESS_TOKEN = 'test-access-token';
export const TEST_REFRESH_TOKEN = 'test-refresh-token';

export const HOME_ID = '9876543210987654321';
export const SHARED_HOME_ID = '1234567890123456789';
export const DEVICE_ID = '1234567890123456789';

export const userData = {
    username: TEST_LOGIN,
    nickname: 'Tester',
    email: TEST_LOGIN,
    phone: '',
    timeZoneId: '209',
    timeZone: 'GMT-05:00',
    timezoneName: 'America/Toronto',
    datacenterPhoneCode: 49,
    datacenter: 'EU',
    datacenterHost: 'https://api-ecos-eu.weiheng-tech.com',
};

export const homesData = [
    {
        homeId: SHARED_HOME_ID,
        homeName: 'anything',
        homeType: '0',
        longitude: null,
        latitude: null,
        homeDeviceNumber: 1,
        relationType: 1,
        createTime: 946684800000,
        updateTime: 946684800000,
    },
    {
        homeId: HOME_ID,
        homeName: 'My Home',
        homeType: 1,
        longitude: 2.35,
        latitude: 48.85,
        homeDeviceNumber: 1,
        relationType: 1,
        createTime: 946684800000,
        updateTime: 1735689600000,
    },
];

export const devicesData = [
    {
        deviceId: DEVICE_ID,
        deviceAliasName: 'My Device',
        wifiSn: 'test-wifi-sn',
        state: 0,
        batterySoc: 42.5,
        batteryPower: -300,
        socketSwitch: null,
        chargeStationMode: null,
        vpp: false,
        type: 1,
        deviceSn: 'SHC000000000000001',
        agentId: '9876543210987654321',
        lon: 0.0,
        lat: 0.0,
        deviceType: 'XX-XXX123',
        resourceSeriesId: 101,
        resourceTypeId: 7,
        master: 0,
        emsSoftwareVersion: '000-00000-00',
        dsp1SoftwareVersion: '111-11111-11',
    },
];

export const powerSeriesData = {
    solarPowerDps: { '946685400': 120.0, '946685100': 100.0 },
    batteryPowerDps: { '946685100': 0.0, '946685400': -50.0 },
    gridPowerDps: { '946685100': 10.0, '946685400': 12.0 },
    meterPowerDps: { '946685100': 300.0, '946685400': 280.0 },
    homePowerDps: { '946685100': 400.0, '946685400': 350.0, '946685700': 330.0 },
    epsPowerDps: {},
};

export const deviceRunData = {
    batterySoc: 0.0,
    batteryPower: 0,
    epsPower: 0,
    gridPower: 4194,
    homePower: 3798,
    meterPower: -650,
    solarPower: 4448,
    sysRunMode: 1,
    isExistSolar: true,
    sysPowerConfig: 3,
};

export const homeRunData = {
    batteryPower: 0,
    epsPower: 0,
    gridPower: 23,
    homePower: 1118,
    meterPower: 1118,
    solarPower: 0,
    chargePower: 0,
    batterySocList: [
        {
            deviceSn: 'SHC000000000000001',
            batterySoc: 87.0,
            sysRunMode: 1,
            isExistSolar: true,
            sysPowerConfig: 3,
        },
    ],
};

export const historyData = {
    energyConsumption: 1221.2,
    solarPercent: 47.0,
    homeEnergyDps: {
        '1733198400': 68.1,
        '1733112000': 39.6,
    },
};

export const insightData = {
    selfPowered: 35,
    deviceRealtimeDto: {
        solarPowerDps: { '1732129500': 0.0, '1732129800': 15.0 },
        batteryPowerDps: { '1732129500': 0.0, '1732129800': 0.0 },
        gridPowerDps: { '1732129500': 0.0, '1732129800': 0.0 },
        meterPowerDps: { '1732129500': 500.0, '1732129800': 480.0 },
        homePowerDps: { '1732129500': 500.0, '1732129800': 495.0 },
        epsPowerDps: { '1732129500': 0.0, '1732129800': 0.0 },
    },
    deviceStatisticsDto: {
        consumptionEnergy: 12.5,
        fromBattery: 1.5,
        toBattery: 2.0,
        fromGrid: 6.0,
        toGrid: 0.5,
        fromSolar: 5.0,
        eps: 0.0,
    },
    insightConsumptionDataDto: null,
};

export const weeklyEnergyData = {
    today: 1,
    lastWeekTotalSolar: 125.7,
    lastWeekTotalGrid: 145.1,
    lastWeekTotalCarbonEmissions: 125.326,
    lastWeekTotalSaveStandardCoal: 50.78,
    weekEnergy: {
        '2': { solarEnergy: 17.7, gridEnergy: 29.6, toGrid: 6.5, homeEnergy: 40.8, selfPowered: 27 },
        '1': { solarEnergy: 12.9, gridEnergy: 3.8, toGrid: 6.9, homeEnergy: 9.8, selfPowered: 61 },
    },
    carbonEmissionsWeekEnergy: {
        '1': { carbonEmissions: 12.861 },
        '2': { carbonEmissions: 17.647 },
    },
    saveStandardCoalWeekEnergy: {
        '1': { saveStandardCoal: 5.212 },
    },
};
