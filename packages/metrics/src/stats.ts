export const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

/** Sample standard deviation (n − 1); 0 below two values. */
export const standardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => {
      const diff = value - avg;
      return acc + diff * diff;
    }, 0) /
    (values.length - 1);
  return Math.sqrt(variance);
};
