import React from "react";
import { Link } from "react-router-dom";
import { motion } from "framer-motion";
import { ChevronRight } from "lucide-react";
import Card from "../ui/Card";
import { catalogEntries, examplePath } from "../../catalog/registry";
import { catalogListVariants, catalogRowVariants } from "../examples/motionVariants";

export interface CatalogListProps {
  title: string;
}

/**
 * Navigation list: one row per example, in registry order.
 */
const CatalogList: React.FC<CatalogListProps> = ({ title }) => (
  <Card className="catalog">
    <h1 className="catalog__title">{title}</h1>
    <nav aria-label="Animation examples">
      <motion.ul
        className="catalog__list"
        variants={catalogListVariants}
        initial="hidden"
        animate="show"
      >
        {catalogEntries.map((entry) => (
          <motion.li key={entry.slug} variants={catalogRowVariants}>
            <Link to={examplePath(entry.slug)} className="catalog__row">
              <span>{entry.label}</span>
              <ChevronRight size={18} aria-hidden="true" />
            </Link>
          </motion.li>
        ))}
      </motion.ul>
    </nav>
  </Card>
);

export default CatalogList;
