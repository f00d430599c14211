const makeRow = (value: number): number[] => new Array<number>(256).fill(value);

export const fillRows = (count: number): number[][] => {
  const rows: number[][] = [];
  for (let i = 0; i < count; i += 1) {
    rows.push(makeRow(i));
  }
  return rows;
};
