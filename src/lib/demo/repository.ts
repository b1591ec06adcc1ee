import { z } from "zod";
import {
  authorSchema,
  bookSchema,
  clientSchema,
  productSchema,
  purchaseSchema,
  type Author,
  type Book,
  type Client,
  type ClientActivity,
  type Product,
  type ProductTotal,
  type Purchase,
} from "../backend/schemas";
import bibliotecaFixture from "./fixtures/biblioteca.json";
import comprasFixture from "./fixtures/compras.json";

export interface LibraryStats {
  total_autores: number;
  total_libros: number;
  nacionalidades_autores: number;
  rango_años_publicacion?: {
    año_mas_antiguo: number;
    año_mas_reciente: number;
  };
}

export interface PurchaseStats {
  clientes: number;
  productos: number;
  compras: number;
}

export interface LibraryRepository {
  authors(): Author[];
  author(id: number): Author | undefined;
  authorsByNationality(nationality: string): Author[];
  books(): Book[];
  book(id: number): Book | undefined;
  booksByAuthor(authorId: number): Book[];
  booksByYear(year: number): Book[];
  booksByTitle(term: string): Book[];
  stats(): LibraryStats;
}

export interface PurchasesRepository {
  clients(): Client[];
  clientsByCountry(country: string): Client[];
  clientActivity(): ClientActivity[];
  products(): Product[];
  outOfStock(): Product[];
  mostPurchased(): ProductTotal[];
  /** Distinct products bought between two ISO dates, inclusive. */
  purchasedBetween(from: string, to: string): Product[];
  purchases(): Purchase[];
  purchasesByClient(dni: string): Purchase[];
  stats(): PurchaseStats;
}

const libraryDataSchema = z.object({
  autores: z.array(authorSchema),
  libros: z.array(bookSchema),
});

const purchaseLineSchema = z.object({
  compra_id: z.number(),
  producto_id: z.number(),
  cantidad: z.number(),
});

const purchasesDataSchema = z.object({
  clientes: z.array(clientSchema),
  productos: z.array(productSchema),
  compras: z.array(purchaseSchema),
  lineas: z.array(purchaseLineSchema),
});

export type LibraryData = z.infer<typeof libraryDataSchema>;
export type PurchasesData = z.infer<typeof purchasesDataSchema>;
type PurchaseLine = z.infer<typeof purchaseLineSchema>;

const contains = (haystack: string, needle: string) =>
  haystack.toLowerCase().includes(needle.toLowerCase());

export class InMemoryLibraryRepository implements LibraryRepository {
  constructor(private readonly data: LibraryData) {}

  authors(): Author[] {
    return this.data.autores;
  }

  author(id: number): Author | undefined {
    return this.data.autores.find((a) => a.id === id);
  }

  authorsByNationality(nationality: string): Author[] {
    return this.data.autores.filter((a) => contains(a.nacionalidad, nationality));
  }

  books(): Book[] {
    return this.data.libros;
  }

  book(id: number): Book | undefined {
    return this.data.libros.find((b) => b.id === id);
  }

  booksByAuthor(authorId: number): Book[] {
    return this.data.libros.filter((b) => b.autor_id === authorId);
  }

  booksByYear(year: number): Book[] {
    return this.data.libros.filter((b) => b.anio_publicacion === year);
  }

  booksByTitle(term: string): Book[] {
    return this.data.libros.filter((b) => contains(b.titulo, term));
  }

  stats(): LibraryStats {
    const { autores, libros } = this.data;
    const years = libros.map((b) => b.anio_publicacion);
    return {
      total_autores: autores.length,
      total_libros: libros.length,
      nacionalidades_autores: new Set(autores.map((a) => a.nacionalidad)).size,
      ...(years.length
        ? {
            rango_años_publicacion: {
              año_mas_antiguo: Math.min(...years),
              año_mas_reciente: Math.max(...years),
            },
          }
        : {}),
    };
  }
}

export class InMemoryPurchasesRepository implements PurchasesRepository {
  constructor(private readonly data: PurchasesData) {}

  clients(): Client[] {
    return this.data.clientes;
  }

  clientsByCountry(country: string): Client[] {
    return this.data.clientes.filter((c) => contains(c.pais, country));
  }

  clientActivity(): ClientActivity[] {
    return this.data.clientes.map((client) => ({
      ...client,
      total: this.purchasesByClient(client.dni).length,
    }));
  }

  products(): Product[] {
    return this.data.productos;
  }

  outOfStock(): Product[] {
    return this.data.productos.filter((p) => p.stock <= 0);
  }

  mostPurchased(): ProductTotal[] {
    const totals = new Map<number, number>();
    for (const line of this.data.lineas) {
      totals.set(line.producto_id, (totals.get(line.producto_id) ?? 0) + line.cantidad);
    }
    return this.data.productos
      .filter((p) => totals.has(p.id))
      .map((p) => ({ id: p.id, nombre: p.nombre, total: totals.get(p.id) ?? 0 }))
      .sort((a, b) => b.total - a.total);
  }

  purchasedBetween(from: string, to: string): Product[] {
    const inRange = new Set(
      this.data.compras
        .filter((c) => c.fecha >= from && c.fecha <= to)
        .map((c) => c.id),
    );
    const ids = new Set(
      this.data.lineas
        .filter((l: PurchaseLine) => inRange.has(l.compra_id))
        .map((l) => l.producto_id),
    );
    return this.data.productos.filter((p) => ids.has(p.id));
  }

  purchases(): Purchase[] {
    return this.data.compras;
  }

  purchasesByClient(dni: string): Purchase[] {
    return this.data.compras.filter((c) => c.comprador === dni);
  }

  stats(): PurchaseStats {
    return {
      clientes: this.data.clientes.length,
      productos: this.data.productos.length,
      compras: this.data.compras.length,
    };
  }
}

export function loadLibraryFixture(): LibraryData {
  return libraryDataSchema.parse(bibliotecaFixture);
}

export function loadPurchasesFixture(): PurchasesData {
  return purchasesDataSchema.parse(comprasFixture);
}

export function createFixtureRepositories(): {
  library: InMemoryLibraryRepository;
  purchases: InMemoryPurchasesRepository;
} {
  return {
    library: new InMemoryLibraryRepository(loadLibraryFixture()),
    purchases: new InMemoryPurchasesRepository(loadPurchasesFixture()),
  };
}
