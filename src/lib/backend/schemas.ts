import { z } from "zod";

export const authorSchema = z
  .object({
    id: z.number(),
    nombre: z.string(),
    nacionalidad: z.string(),
  })
  .passthrough();

export const bookSchema = z
  .object({
    id: z.number(),
    titulo: z.string(),
    autor_id: z.number(),
    anio_publicacion: z.number(),
  })
  .passthrough();

export const clientSchema = z
  .object({
    dni: z.string(),
    nombre: z.string(),
    apellidos: z.string(),
    pais: z.string(),
  })
  .passthrough();

export const productSchema = z
  .object({
    id: z.number(),
    nombre: z.string(),
    stock: z.number(),
  })
  .passthrough();

export const purchaseSchema = z
  .object({
    id: z.number(),
    fecha: z.string(),
    comprador: z.string(),
  })
  .passthrough();

export const productTotalSchema = z
  .object({
    id: z.number(),
    nombre: z.string(),
    total: z.number(),
  })
  .passthrough();

export const clientActivitySchema = clientSchema.extend({
  total: z.number(),
});

export const libraryStatsSchema = z
  .object({
    total_autores: z.number(),
    total_libros: z.number(),
  })
  .passthrough();

export const purchaseStatsSchema = z
  .object({
    clientes: z.number(),
    productos: z.number(),
    compras: z.number(),
  })
  .passthrough();

export type Author = z.infer<typeof authorSchema>;
export type Book = z.infer<typeof bookSchema>;
export type Client = z.infer<typeof clientSchema>;
export type Product = z.infer<typeof productSchema>;
export type Purchase = z.infer<typeof purchaseSchema>;
export type ProductTotal = z.infer<typeof productTotalSchema>;
export type ClientActivity = z.infer<typeof clientActivitySchema>;
