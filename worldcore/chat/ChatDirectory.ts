// worldcore/chat/ChatDirectory.ts
//
// Named room registry. Rooms are keyed by name; each join mints a RoomHandle
// bound to (room name, player). Handles share the room's log and roster
// counter through this directory's region, never through a private copy.

import { Region, IdSequence } from "../core/Region";
import { Clock, PlayerInfo, clonePlayer, systemClock } from "../shared/GameTypes";
import { Failure, NotFound, Ok, fail, notFound, ok } from "../shared/Status";
import { Logger } from "../utils/logger";
import { ChatMessage, ChatRoom, RoomInfo, SYSTEM_SENDER, roomInfo } from "./ChatTypes";
import { RoomHandle } from "./RoomHandle";

const log = Logger.scope("CHAT");

export interface ChatDirectoryState {
  rooms: Map<string, ChatRoom>;
  ids: IdSequence;
}

export type CreateRoomResult =
  | Ok<{ info: RoomInfo; room: RoomHandle }>
  | Failure<"alreadyExists">;

export type JoinRoomResult = Ok<{ room: RoomHandle }> | NotFound;

export class ChatDirectory {
  readonly region = new Region<ChatDirectoryState>("chat", {
    rooms: new Map(),
    ids: new IdSequence(),
  });

  constructor(readonly clock: Clock = systemClock) {}

  createRoom(name: string, topic: string): CreateRoomResult {
    const info = this.region.run((s) => {
      if (s.rooms.has(name)) return null;

      const room: ChatRoom = {
        id: s.ids.take(),
        name,
        topic,
        messages: [],
        memberCount: 0,
      };
      s.rooms.set(name, room);
      return roomInfo(room);
    });

    if (!info) {
      log.debug("createRoom: name taken", { name });
      return fail("alreadyExists");
    }

    log.info("Room created", { roomId: info.id, name });
    // The creator's handle speaks as the system sender and is not a member.
    return ok({ info, room: new RoomHandle(this, name, SYSTEM_SENDER) });
  }

  joinRoom(name: string, player: PlayerInfo): JoinRoomResult {
    const memberCount = this.region.run((s) => {
      const room = s.rooms.get(name);
      if (!room) return null;
      room.memberCount += 1;
      return room.memberCount;
    });

    if (memberCount === null) return notFound();

    log.debug("Player joined room", { name, playerId: player.id, memberCount });
    return ok({ room: new RoomHandle(this, name, clonePlayer(player)) });
  }

  listRooms(): { rooms: RoomInfo[] } {
    return this.region.run((s) => ({
      rooms: Array.from(s.rooms.values(), roomInfo),
    }));
  }

  /** Builds a whisper-tagged message. Whispers are not stored in any room log. */
  whisper(from: PlayerInfo, to: Pick<PlayerInfo, "id">, content: string): Ok<{ message: ChatMessage }> {
    return ok({
      message: {
        sender: clonePlayer(from),
        content,
        timestamp: this.clock(),
        kind: { type: "whisper", target: to.id },
      },
    });
  }
}
