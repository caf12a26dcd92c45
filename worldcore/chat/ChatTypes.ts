// worldcore/chat/ChatTypes.ts

import type { PlayerId, PlayerInfo } from "../shared/GameTypes";

export type RoomId = number;

export type ChatMessageKind =
  | { type: "normal" }
  | { type: "emote" }
  | { type: "whisper"; target: PlayerId };

export interface ChatMessage {
  // Captured at send time; later changes to the player are not reflected
  sender: PlayerInfo;
  content: string;
  timestamp: number;
  kind: ChatMessageKind;
}

export interface RoomInfo {
  id: RoomId;
  name: string;
  topic: string;
  memberCount: number;
}

export interface ChatRoom {
  id: RoomId;
  name: string;
  topic: string;
  // Append-only, chronological
  messages: ChatMessage[];
  memberCount: number;
}

/** Sender bound to the handle minted by createRoom. */
export const SYSTEM_SENDER: PlayerInfo = {
  id: 0,
  name: "system",
  faction: "neutral",
  level: 0,
};

export function roomInfo(room: ChatRoom): RoomInfo {
  return {
    id: room.id,
    name: room.name,
    topic: room.topic,
    memberCount: room.memberCount,
  };
}

export function cloneMessage(m: ChatMessage): ChatMessage {
  return {
    sender: { ...m.sender },
    content: m.content,
    timestamp: m.timestamp,
    kind: { ...m.kind },
  };
}
