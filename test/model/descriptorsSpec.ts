import { defineType, getConstructor, getEvent, getMethod, Types, UnresolvedMemberError } from "@src";
import { Foo, Read, Server, ServerConstructor } from "../serverModel";

describe("Type descriptors", () => {
    it("should resolve events by name", () => {
        expect(getEvent(Server, "Foo")).toBe(Foo);
    });

    it("should resolve methods by name and parameter types", () => {
        expect(getMethod(Server, "Read", Types.number, Types.string)).toBe(Read);
    });

    it("should resolve constructors by parameter types", () => {
        expect(getConstructor(Server, Types.string)).toBe(ServerConstructor);
    });

    it("should distinguish overloads", () => {
        const Client = defineType("Client");
        const sendText = Client.defineMethod("Send", [Types.string]);
        const sendCode = Client.defineMethod("Send", [Types.number]);

        expect(Client.getMethod("Send", Types.number)).toBe(sendCode);
        expect(Client.getMethod("Send", Types.string)).toBe(sendText);
    });

    it("should report members that cannot be resolved", () => {
        expect(() => getEvent(Server, "Missing")).toThrow(UnresolvedMemberError);
        expect(() => getEvent(Server, "Missing")).toThrow("Cannot resolve event 'Missing' for type 'Server'");
        expect(() => getMethod(Server, "Read", Types.number)).toThrow("Cannot resolve method 'Read' in type 'Server'");
        expect(() => getConstructor(Server)).toThrow("Cannot resolve constructor for type 'Server'");
    });

    it("should require a type", () => {
        expect(() => getEvent(null, "Foo")).toThrow("type must be provided");
        expect(() => getMethod(undefined, "Read")).toThrow(TypeError);
    });

    it("should not resolve a constructor as a method", () => {
        expect(() => getMethod(Server, "Server", Types.string)).toThrow(UnresolvedMemberError);
    });

    it("should render members with their declaring type", () => {
        expect(Foo.toString()).toBe("Server.Foo");
        expect(Read.toString()).toBe("Server.Read(number, out string)");
        expect(ServerConstructor.toString()).toBe("Server.Server(string)");
    });

    it("should expose event parameters as outputs", () => {
        expect(Foo.outputTypes).toEqual([Types.number]);
        expect(ServerConstructor.outputTypes).toEqual([]);
    });

    it("should name undeclared parameters by position", () => {
        expect(Foo.parameters).toEqual([{ name: "arg0", type: Types.number }]);
    });
});
