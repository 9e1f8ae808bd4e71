import { ListenerDeclarationError } from "../errors/errors";
import { ownerName } from "../errors/helpers";
import { defaultListenerCatalog, type ListenerCatalog } from "./catalog";
import { isCallable } from "./helpers";
import type { ListenerDeclaration, ListenerDiscovery, ResolvedListener } from "./types";

type CacheEntry = { version: number; declarations: readonly ListenerDeclaration[] };

/**
 * Resolves listeners from a {@link ListenerCatalog}.
 *
 * Declarations are collected along the prototype chain, base class first, and
 * cached per prototype until the catalog changes.
 */
export class DeclaredListenerDiscovery implements ListenerDiscovery {
    private readonly cache = new WeakMap<object, CacheEntry>();

    constructor(private readonly catalog: ListenerCatalog = defaultListenerCatalog) {}

    resolve(owner: object): ResolvedListener[] {
        const className = ownerName(owner);
        return this.declarationsFor(owner).map((declaration) => {
            const method: unknown = Reflect.get(owner, declaration.method);
            if (!isCallable(method)) {
                throw new ListenerDeclarationError(
                    `"${className}.${declaration.method}" is not a method and cannot listen to signal "${declaration.kind.id}"`,
                );
            }
            return {
                kind: declaration.kind,
                method,
                name: `${className}.${declaration.method}`,
                cardinality: declaration.cardinality,
            };
        });
    }

    private declarationsFor(owner: object): readonly ListenerDeclaration[] {
        const proto = Reflect.getPrototypeOf(owner);
        if (!proto) return [];

        const cached = this.cache.get(proto);
        if (cached && cached.version === this.catalog.version) {
            return cached.declarations;
        }

        const declarations = this.collect(proto);
        this.cache.set(proto, { version: this.catalog.version, declarations });
        return declarations;
    }

    private collect(proto: object): ListenerDeclaration[] {
        const chain: object[] = [];
        for (let p: object | null = proto; p; p = Reflect.getPrototypeOf(p)) {
            const ctor: unknown = Reflect.getOwnPropertyDescriptor(p, "constructor")?.value;
            if (typeof ctor === "function") chain.unshift(ctor);
        }

        const result: ListenerDeclaration[] = [];
        for (const ctor of chain) {
            for (const declaration of this.catalog.own(ctor)) {
                const inherited = result.some((d) => d.kind === declaration.kind && d.method === declaration.method);
                if (!inherited) result.push(declaration);
            }
        }
        return result;
    }
}
