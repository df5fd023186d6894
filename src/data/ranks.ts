export type RankThreshold = {
  name: string
  minXp: number
}

export const DEFAULT_RANKS: RankThreshold[] = [
  { name: "Bronze", minXp: 0 },
  { name: "Silver", minXp: 1500 },
  { name: "Gold", minXp: 5000 },
  { name: "Platinum", minXp: 15000 },
  { name: "Diamond", minXp: 50000 },
  { name: "Legend", minXp: 150000 },
];
