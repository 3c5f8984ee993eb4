export type SimulationConfig = {
  startTick: number;
  startTreasury: number;
  startPollution: number;
  startVitality: number;
  startTrust: number;
  startIncome: number;
  baseGrowth: number;
  generationLength: number; // 한 턴(세대)이 진행하는 연수
  endTick: number;
  winPollutionThreshold: number;
  winVitalityThreshold: number;
  generationNames: string[];
};
