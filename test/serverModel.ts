import { defineType, Types } from "@src";

export class ServerInstance {
    constructor(public readonly id: string) { }

    toString() {
        return `Server#${this.id}`;
    }
}

export const Server = defineType<ServerInstance>("Server");
export const IServerAdapter = defineType("IServerAdapter", { adapter: true });
export const ServerAdapter = defineType("ServerAdapter", { interfaces: [IServerAdapter] });
export const LoggingServerAdapter = defineType("LoggingServerAdapter", { base: ServerAdapter });

export const Foo = Server.defineEvent("Foo", [Types.number]);
export const Renamed = Server.defineEvent("Renamed", [Types.number, Types.string]);
export const Restarted = Server.defineEvent("Restarted", [Types.string], { isStatic: true });
export const Connected = ServerAdapter.defineEvent("Connected", [Types.string]);

export const Read = Server.defineMethod("Read", [
    { name: "count", type: Types.number },
    { name: "buffer", type: Types.string, byRef: true }
], Types.number);
export const Reset = Server.defineMethod("Reset", [], null, { isStatic: true });
export const Open = ServerAdapter.defineMethod("Open", [Types.string], Types.boolean);
export const ServerConstructor = Server.defineConstructor([Types.string]);
