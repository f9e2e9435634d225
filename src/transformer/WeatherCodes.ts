/**
 * WMO weather interpretation codes as reported by Open-Meteo (`weather_code`).
 */
export const WEATHER_CODE_DESCRIPTIONS: Readonly<Record<number, string>> = {
    0: 'Clear sky',
    1: 'Mainly clear',
    2: 'Partly cloudy',
    3: 'Overcast',
    45: 'Fog',
    48: 'Depositing rime fog',
    51: 'Light drizzle',
    53: 'Moderate drizzle',
    55: 'Dense drizzle',
    56: 'Light freezing drizzle',
    57: 'Dense freezing drizzle',
    61: 'Slight rain',
    63: 'Moderate rain',
    65: 'Heavy rain',
    66: 'Light freezing rain',
    67: 'Heavy freezing rain',
    71: 'Slight snow',
    73: 'Moderate snow',
    75: 'Heavy snow',
    77: 'Snow grains',
    80: 'Slight rain showers',
    81: 'Moderate rain showers',
    82: 'Violent rain showers',
    85: 'Slight snow showers',
    86: 'Heavy snow showers',
    95: 'Thunderstorm',
    96: 'Thunderstorm with slight hail',
    99: 'Thunderstorm with heavy hail',
};

export function describeWeatherCode(code: number | null): string {
    if (code === null) return 'Unknown';
    return WEATHER_CODE_DESCRIPTIONS[code] ?? 'Unknown';
}

/**
 * Maps an API variable to the column it is stored under, plus the unit
 * conversions accepted from `current_units`.
 */
export interface MetricMapping {
    apiName: string;
    column: string;
    conversions: Record<string, (value: number) => number>;
}

const identity = (value: number): number => value;

export const METRIC_MAPPINGS: readonly MetricMapping[] = [
    {
        apiName: 'temperature_2m',
        column: 'temperature_celsius',
        conversions: {
            '°C': identity,
            '°F': (f) => ((f - 32) * 5) / 9,
        },
    },
    {
        apiName: 'relative_humidity_2m',
        column: 'relative_humidity',
        conversions: { '%': identity },
    },
    {
        apiName: 'precipitation',
        column: 'precipitation_mm',
        conversions: {
            'mm': identity,
            'inch': (inch) => inch * 25.4,
        },
    },
    {
        apiName: 'wind_speed_10m',
        column: 'wind_speed_kmh',
        conversions: {
            'km/h': identity,
            'm/s': (ms) => ms * 3.6,
            'mp/h': (mph) => mph * 1.609344,
            'kn': (kn) => kn * 1.852,
        },
    },
];
