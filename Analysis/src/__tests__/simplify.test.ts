import { afterEach, describe, it, expect, vi } from "vitest";
import { simplifyRoute } from "../simplify.js";

afterEach(() => {
    vi.restoreAllMocks();
});

describe("simplifyRoute", () => {
    it("absorbs interior walking into the mode before it", () => {
        expect(simplifyRoute("walking(5분) -> bus(15분) -> walking(3분) -> subway(20분) -> walking(2분)"))
            .toBe("walking(5분) -> bus(18분) -> subway(20분) -> walking(2분)");
    });

    it("merges consecutive segments of one mode", () => {
        expect(simplifyRoute("walking(3분) -> bus(10분) -> bus(5분) -> walking(4분)"))
            .toBe("walking(3분) -> bus(15분) -> walking(4분)");
    });

    it("keeps accumulating across walking between the same mode", () => {
        expect(simplifyRoute("bus(50분) -> walking(5분) -> bus(20분)")).toBe("bus(1시간 15분)");
    });

    it("drops interior walking when no mode is accumulating", () => {
        expect(simplifyRoute("walking(5분) -> walking(3분) -> bus(10분) -> walking(2분)"))
            .toBe("walking(5분) -> bus(10분) -> walking(2분)");
        expect(simplifyRoute("walking(1분) -> walking(2분) -> walking(3분)")).toBe("walking(1분) -> walking(3분)");
    });

    it("keeps first and last walking text verbatim", () => {
        expect(simplifyRoute("walking(5 분) -> bus(3분) -> walking(1시간 0분)"))
            .toBe("walking(5 분) -> bus(3분) -> walking(1시간 0분)");
    });

    it("handles single segments and empty input", () => {
        expect(simplifyRoute("walking(4분)")).toBe("walking(4분)");
        expect(simplifyRoute("bus(1시간)")).toBe("bus(1시간)");
        expect(simplifyRoute("")).toBe("");
        expect(simplifyRoute(undefined)).toBe("");
    });

    it("truncates fractional minutes when accumulating", () => {
        expect(simplifyRoute("bus(2.5분) -> subway(3분)")).toBe("bus(2분) -> subway(3분)");
    });

    it("decides first/last among the tokens it could parse", () => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        expect(simplifyRoute("bus(5분) -> junk -> walking(2분)")).toBe("bus(5분) -> walking(2분)");
    });

    it("is a no-op on its own output", () => {
        const routes = [
            "walking(5분) -> bus(15분) -> walking(3분) -> subway(20분) -> walking(2분)",
            "walking(1분) -> bus(1분) -> walking(1분) -> walking(1분)",
            "walking(1분) -> walking(2분) -> walking(3분)",
            "walking(2분) -> walking(3분)",
            "bus(5분) -> walking(2분) -> bus(3분)",
            "subway(40분) -> subway(30분) -> bus(1시간 5분)",
            "walking(7 분)",
            "bus(2.5분)",
            "",
        ];
        for (const r of routes) {
            const once = simplifyRoute(r);
            expect(simplifyRoute(once)).toBe(once);
        }
    });
});
