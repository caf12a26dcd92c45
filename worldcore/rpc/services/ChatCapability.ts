// worldcore/rpc/services/ChatCapability.ts

import type { ChatDirectory } from "../../chat/ChatDirectory";
import type { RoomHandle } from "../../chat/RoomHandle";
import { CapabilityServer, method } from "../Capability";
import {
  contentParams,
  createRoomParams,
  historyParams,
  joinRoomParams,
  noParams,
  whisperParams,
} from "../schemas";

export class RoomCapability extends CapabilityServer {
  constructor(readonly room: RoomHandle) {
    super("room", {
      sendMessage: method(contentParams, (p) => room.sendMessage(p.content)),
      sendEmote: method(contentParams, (p) => room.sendEmote(p.content)),
      getHistory: method(historyParams, (p) => room.getHistory(p.limit)),
      getInfo: method(noParams, () => room.getInfo()),
      leave: method(noParams, () => room.leave()),
    });
  }
}

export class ChatCapability extends CapabilityServer {
  constructor(chat: ChatDirectory) {
    super("chat", {
      createRoom: method(createRoomParams, (p, ctx) => {
        const res = chat.createRoom(p.name, p.topic);
        if (res.status !== "ok") return res;
        return { ...res, room: ctx.export(new RoomCapability(res.room)) };
      }),
      joinRoom: method(joinRoomParams, (p, ctx) => {
        const res = chat.joinRoom(p.name, p.player);
        if (res.status !== "ok") return res;
        return { ...res, room: ctx.export(new RoomCapability(res.room)) };
      }),
      listRooms: method(noParams, () => chat.listRooms()),
      whisper: method(whisperParams, (p) => chat.whisper(p.from, p.to, p.content)),
    });
  }
}
