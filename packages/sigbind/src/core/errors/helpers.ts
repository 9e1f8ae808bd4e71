/** English ordinal for a 1-based position: 1st, 2nd, 3rd, 4th, 11th, 21st... */
export function ordinal(n: number): string {
    const mod100 = n % 100;
    if (mod100 >= 11 && mod100 <= 13) return `${n}th`;

    switch (n % 10) {
        case 1:
            return `${n}st`;
        case 2:
            return `${n}nd`;
        case 3:
            return `${n}rd`;
        default:
            return `${n}th`;
    }
}

/** Display name for a listener owner: its class name, or the function name for plain callbacks. */
export function ownerName(owner: object): string {
    if (typeof owner === "function") {
        return owner.name || "anonymous function";
    }
    const ctor: unknown = Reflect.getPrototypeOf(owner)?.constructor;
    if (typeof ctor === "function" && ctor.name) {
        return ctor.name;
    }
    return "Object";
}
