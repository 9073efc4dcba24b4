import { CreateCategoryDto } from '../categories/dto/create-category.dto';
import { CreateProductDto } from '../products/dto/create-product.dto';
import { CreateOrderDto } from '../orders/dto/create-order.dto';
import { OrderStatus } from '../orders/order-status.enum';

const unsplash = (photo: string) =>
  `https://images.unsplash.com/${photo}?w=800&q=80&auto=format&fit=crop`;

export const SEED_CATEGORIES: CreateCategoryDto[] = [
  { name: 'Buah & Sayur', slug: 'produce', icon: 'apple' },
  { name: 'Daging & Protein', slug: 'meat', icon: 'beef' },
  { name: 'Susu & Produk Dingin', slug: 'dairy', icon: 'milk' },
  { name: 'Snack & Minuman', slug: 'snacks', icon: 'snack' },
];

export const SEED_PRODUCTS: CreateProductDto[] = [
  {
    title: 'Apel Fuji 1kg',
    description: 'Apel manis dan segar kualitas premium.',
    price: '35000.00',
    categorySlug: 'produce',
    inStock: true,
    image: unsplash('photo-1567306226416-28f0efdc88ce'),
    rating: 4.7,
  },
  {
    title: 'Pisang Cavendish 1kg',
    description: 'Pisang matang siap makan.',
    price: '24000.00',
    categorySlug: 'produce',
    inStock: true,
    image: unsplash('photo-1571772805064-207cd5b3e23d'),
    rating: 4.5,
  },
  {
    title: 'Dada Ayam Fillet 500g',
    description: 'Daging ayam tanpa tulang.',
    price: '42000.00',
    categorySlug: 'meat',
    inStock: true,
    image: unsplash('photo-1550332781-aecd27f7434b'),
    rating: 4.6,
  },
  {
    title: 'Susu UHT 1L',
    description: 'Susu segar UHT full cream.',
    price: '18000.00',
    categorySlug: 'dairy',
    inStock: true,
    image: unsplash('photo-1582719478250-c89cae4dc85b'),
    rating: 4.4,
  },
  {
    title: 'Keripik Kentang 100g',
    description: 'Snack renyah rasa original.',
    price: '12000.00',
    categorySlug: 'snacks',
    inStock: true,
    image: unsplash('photo-1540189549336-e6e99c3679fe'),
    rating: 4.3,
  },
];

export const SEED_ORDER: CreateOrderDto = {
  buyerName: 'Budi',
  buyerEmail: 'budi@example.com',
  buyerAddress: 'Jl. Mawar No. 1, Jakarta',
  subtotal: '87000.00',
  discount: '8700.00',
  deliveryFee: '15000.00',
  total: '93300.00',
  status: OrderStatus.PENDING,
  couponCode: 'HEMAT10',
  items: [
    { productId: 'mock-apple', title: 'Apel Fuji 1kg', price: '35000.00', quantity: 1, image: null },
    { productId: 'mock-chips', title: 'Keripik Kentang 100g', price: '12000.00', quantity: 2, image: null },
  ],
};

export interface SeedFixture {
  categories: CreateCategoryDto[];
  products: CreateProductDto[];
  orders: CreateOrderDto[];
}

export const SUPERMARKET_FIXTURE: SeedFixture = {
  categories: SEED_CATEGORIES,
  products: SEED_PRODUCTS,
  orders: [SEED_ORDER],
};
