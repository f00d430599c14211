export default (): string[] => ['ran'];

export const rows = (): number[] => [1, 2, 3];

export const limit = 3;
