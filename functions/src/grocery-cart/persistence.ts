import { FieldValue, Firestore } from "firebase-admin/firestore";
import { CARTS_COLLECTION } from "../constants";
import { Cart } from "../types";

export const saveCart = async (db: Firestore, cart: Cart): Promise<string> => {
  const ref = await db.collection(CARTS_COLLECTION).add({
    ...cart,
    createdAt: FieldValue.serverTimestamp(),
  });
  return ref.id;
};
