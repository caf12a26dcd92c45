// worldcore/chat/RoomHandle.ts

import type { PlayerInfo } from "../shared/GameTypes";
import { NotFound, Ok, OK, notFound, ok } from "../shared/Status";
import type { ChatDirectory } from "./ChatDirectory";
import { ChatMessage, ChatMessageKind, RoomInfo, cloneMessage, roomInfo } from "./ChatTypes";

export type SendResult = Ok<{ message: ChatMessage }> | NotFound;

/**
 * Capability bound to one (room, player) pair.
 *
 * Holds only its binding. The room itself is looked up by name on every call,
 * so a room that no longer resolves yields notFound rather than a stale write.
 *
 * leave() decrements the shared member counter but does not invalidate the
 * handle; later calls on a left handle still reach the room.
 */
export class RoomHandle {
  constructor(
    private readonly directory: ChatDirectory,
    readonly roomName: string,
    readonly sender: PlayerInfo,
  ) {}

  sendMessage(content: string): SendResult {
    return this.append(content, { type: "normal" });
  }

  sendEmote(content: string): SendResult {
    return this.append(content, { type: "emote" });
  }

  /** Most recent `limit` messages, oldest first. Copies; the log itself is append-only. */
  getHistory(limit: number): { messages: ChatMessage[] } {
    const messages = this.directory.region.run((s) => {
      const room = s.rooms.get(this.roomName);
      if (!room) return [];
      const log = room.messages;
      return log.slice(Math.max(0, log.length - limit)).map(cloneMessage);
    });
    return { messages };
  }

  getInfo(): Ok<{ info: RoomInfo }> | NotFound {
    return this.directory.region.run((s) => {
      const room = s.rooms.get(this.roomName);
      return room ? ok({ info: roomInfo(room) }) : notFound();
    });
  }

  leave(): Ok | NotFound {
    return this.directory.region.run((s) => {
      const room = s.rooms.get(this.roomName);
      if (!room) return notFound();
      room.memberCount = Math.max(0, room.memberCount - 1);
      return OK;
    });
  }

  private append(content: string, kind: ChatMessageKind): SendResult {
    const timestamp = this.directory.clock();
    return this.directory.region.run((s) => {
      const room = s.rooms.get(this.roomName);
      if (!room) return notFound();

      const message: ChatMessage = {
        sender: { ...this.sender },
        content,
        timestamp,
        kind,
      };
      room.messages.push(message);
      return ok({ message: cloneMessage(message) });
    });
  }
}
