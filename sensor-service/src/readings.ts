export interface TelemetrySample {
  temperature: number;
  humidity: number;
}

export type ReadingSource = () => TelemetrySample;

const round2 = (n: number) => Math.round(n * 100) / 100;

// Temperature in 15..26 °C, humidity in 35..66 %RH.
export function createReadingSource(random: () => number = Math.random): ReadingSource {
  return () => ({
    temperature: round2(20 + (random() * 10 - 5) + random()),
    humidity: round2(50 + (random() * 30 - 15) + random()),
  });
}
