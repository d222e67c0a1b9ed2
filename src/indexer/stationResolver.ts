export type StationResolver = {
  resolve: (name: string) => number | null;
  unresolvedNames: () => string[];
};

// Station lists write "Foo(Bar)" where GTFS feeds write "Foo (Bar)".
export function parenthesisVariant(name: string): string {
  return name.replace(/ \(/g, "(");
}

export function createStationResolver(table: Map<string, number>): StationResolver {
  const unresolved = new Set<string>();

  function resolve(name: string): number | null {
    const direct = table.get(name);
    if (direct !== undefined) return direct;

    const variant = table.get(parenthesisVariant(name));
    if (variant !== undefined) return variant;

    unresolved.add(name);
    return null;
  }

  return {
    resolve,
    unresolvedNames: () => Array.from(unresolved).sort(),
  };
}
