import { ListenerDeclarationError } from "../errors/errors";
import type { ListenerClass, ListenerDeclaration } from "./types";

/** Listener declarations per class, as recorded by {@link declareListeners}. */
export class ListenerCatalog {
    private readonly declarations = new WeakMap<object, ListenerDeclaration[]>();
    private revision = 0;

    /** Bumped on every change; discovery caches compare against it. */
    get version(): number {
        return this.revision;
    }

    declare(ctor: ListenerClass, declaration: ListenerDeclaration): void {
        const own = this.declarations.get(ctor) ?? [];
        const duplicate = own.some((d) => d.kind === declaration.kind && d.method === declaration.method);
        if (duplicate) {
            throw new ListenerDeclarationError(
                `"${ctor.name}.${declaration.method}" is already declared as a listener of signal "${declaration.kind.id}"`,
            );
        }
        own.push(declaration);
        this.declarations.set(ctor, own);
        this.revision++;
    }

    /** Declarations made directly on `ctor`, not its base classes. */
    own(ctor: object): readonly ListenerDeclaration[] {
        return this.declarations.get(ctor) ?? [];
    }
}

export const defaultListenerCatalog = new ListenerCatalog();
