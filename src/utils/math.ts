import BigNumber from 'bignumber.js';

export const toBigNumber = (value: string | number): BigNumber => {
    return new BigNumber(value);
};

export const clamp = (value: number, min: number = 0, max: number = 1): number => {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
};

export const sigmoid = (x: number): number => {
    return 1 / (1 + Math.exp(-x));
};

export const calculateMovingAverage = (values: number[]): number => {
    if (values.length === 0) return 0;
    const sum = values.reduce((a, b) => a + b, 0);
    return sum / values.length;
};
