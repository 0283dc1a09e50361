export type ProtocolVersion = 'game_v1';

export type MoveDir = 'up' | 'down' | 'left' | 'right';

export type GameStartRequest = {
  sessionKey: string;
  ownerId: string;
  ownerLabel: string;
};

// Any direction string is accepted; unknown ones leave the player in place.
export type GameMoveRequest = {
  sessionKey: string;
  direction: string;
};

export type GameTextResponse = {
  ok: true;
  version: ProtocolVersion;
  text: string;
};

export type LeaderboardRow = {
  rank: number;
  playerId: string;
  label: string;
  bestScore: number;
};

export type LeaderboardResponse = {
  ok: true;
  version: ProtocolVersion;
  entries: LeaderboardRow[];
  text: string;
};

export type ApiErrorResponse = {
  ok: false;
  error: string;
};
