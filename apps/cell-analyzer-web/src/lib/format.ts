const NUMBER_LOCALE = "en-US";

const DEFAULT_NUMBER_OPTIONS: Intl.NumberFormatOptions = {
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
};

const TWO_PLACE_OPTIONS: Intl.NumberFormatOptions = {
  minimumFractionDigits: 1,
  maximumFractionDigits: 2,
};

export const formatNumber = (
  value: number,
  options: Intl.NumberFormatOptions = DEFAULT_NUMBER_OPTIONS,
) =>
  Number.isFinite(value)
    ? value.toLocaleString(NUMBER_LOCALE, options)
    : Number(0).toLocaleString(NUMBER_LOCALE, options);

export const formatVolts = (value: number) =>
  Number.isFinite(value) ? `${formatNumber(value)} V` : "—";

export const formatAmps = (value: number) =>
  Number.isFinite(value) ? `${formatNumber(value, TWO_PLACE_OPTIONS)} A` : "—";

export const formatWattHours = (value: number) =>
  Number.isFinite(value) ? `${formatNumber(value, TWO_PLACE_OPTIONS)} Wh` : "—";

export const formatCelsius = (value: number) =>
  Number.isFinite(value) ? `${formatNumber(value)} °C` : "—";

export const formatVoltageRange = (min: number, max: number) =>
  `${formatVolts(min)} - ${formatVolts(max)}`;
